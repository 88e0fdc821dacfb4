import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import {
  JsonRpcResponse,
  OdooTransport,
} from './interfaces/odoo.interface';

/** Error envelope returned by the server, e.g. an AccessError or a ValidationError. */
export class OdooRpcFault extends Error {
  readonly name = 'OdooRpcFault';

  constructor(
    message: string,
    readonly code: number,
    readonly faultName?: string,
  ) {
    super(message);
  }
}

export class JsonRpcTransport implements OdooTransport {
  constructor(private readonly apiClient: AxiosInstance) {}

  static create(baseURL: string, timeout: number): JsonRpcTransport {
    return new JsonRpcTransport(
      axios.create({
        baseURL,
        headers: {
          'Content-Type': 'application/json',
        },
        timeout,
      }),
    );
  }

  async authenticate(
    db: string,
    login: string,
    secret: string,
  ): Promise<number | false> {
    const uid = await this.call('common', 'authenticate', [db, login, secret, {}]);
    return typeof uid === 'number' && uid > 0 ? uid : false;
  }

  execute(
    db: string,
    uid: number,
    secret: string,
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown>,
  ): Promise<unknown> {
    return this.call('object', 'execute_kw', [
      db,
      uid,
      secret,
      model,
      method,
      args,
      kwargs,
    ]);
  }

  private async call(
    service: string,
    method: string,
    args: unknown[],
  ): Promise<unknown> {
    const response = await this.apiClient.post<JsonRpcResponse>('/jsonrpc', {
      jsonrpc: '2.0',
      method: 'call',
      params: { service, method, args },
      id: uuidv4(),
    });

    const { error, result } = response.data;
    if (error) {
      throw new OdooRpcFault(
        error.data?.message || error.message,
        error.code,
        error.data?.name,
      );
    }
    return result;
  }
}
