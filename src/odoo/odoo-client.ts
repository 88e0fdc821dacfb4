import { Logger } from '@nestjs/common';
import {
  ConnectionError,
  errorMessage,
  RemoteCallError,
} from '../common/errors/sync.errors';
import type { OdooConnection } from '../integrations/integration.types';
import {
  isOdooRecord,
  OdooDomain,
  OdooRecord,
  OdooTransport,
  OdooValues,
  SearchReadOptions,
} from './interfaces/odoo.interface';

/**
 * One authenticated session against an Odoo database.
 *
 * The client fails closed: when authentication does not succeed it stays
 * disconnected and every primitive throws {@link ConnectionError}. It never
 * re-authenticates and never retries a call.
 */
export class OdooClient {
  private readonly logger = new Logger(OdooClient.name);

  private constructor(
    readonly connection: OdooConnection,
    private readonly transport: OdooTransport,
    private readonly uid: number | null,
    private readonly failure: string | null,
  ) {}

  static async connect(
    connection: OdooConnection,
    transport: OdooTransport,
  ): Promise<OdooClient> {
    const logger = new Logger(OdooClient.name);

    try {
      logger.log(`Authenticating with Odoo at ${connection.url}...`);
      const uid = await transport.authenticate(
        connection.database,
        connection.username,
        connection.apiKey,
      );

      if (uid === false) {
        logger.error(`Authentication with Odoo at ${connection.url} failed`);
        return new OdooClient(connection, transport, null, 'authentication failed');
      }

      logger.log(`Successfully connected to Odoo at ${connection.url}`);
      return new OdooClient(connection, transport, uid, null);
    } catch (error) {
      logger.error(`Error connecting to Odoo: ${errorMessage(error)}`);
      return new OdooClient(connection, transport, null, errorMessage(error));
    }
  }

  get isConnected(): boolean {
    return this.uid !== null;
  }

  /** Why the session could not be opened, when it could not. */
  get connectionFailure(): string | null {
    return this.failure;
  }

  assertConnected(): number {
    if (this.uid === null) {
      throw new ConnectionError(
        this.connection.url,
        this.failure ?? 'not authenticated',
      );
    }
    return this.uid;
  }

  async searchRead(
    model: string,
    domain: OdooDomain = [],
    options: SearchReadOptions = {},
  ): Promise<OdooRecord[]> {
    const kwargs: Record<string, unknown> = { fields: options.fields ?? [] };
    if (options.limit !== undefined) kwargs.limit = options.limit;
    if (options.offset) kwargs.offset = options.offset;
    if (options.order) kwargs.order = options.order;

    const result = await this.execute(model, 'search_read', [domain], kwargs);
    if (!Array.isArray(result) || !result.every(isOdooRecord)) {
      throw new RemoteCallError(
        model,
        'search_read',
        new Error('expected a list of records'),
      );
    }
    return result;
  }

  async create(model: string, values: OdooValues): Promise<number> {
    const result = await this.execute(model, 'create', [values], {});
    // Newer servers answer a single-record create with a one-element list.
    const id = Array.isArray(result) ? result[0] : result;
    if (typeof id !== 'number') {
      throw new RemoteCallError(model, 'create', new Error('no record id returned'));
    }
    return id;
  }

  async write(model: string, ids: number[], values: OdooValues): Promise<boolean> {
    const result = await this.execute(model, 'write', [ids, values], {});
    return result === true;
  }

  async delete(model: string, ids: number[]): Promise<boolean> {
    if (ids.length === 0) {
      return true;
    }
    const result = await this.execute(model, 'unlink', [ids], {});
    return result === true;
  }

  private async execute(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown>,
  ): Promise<unknown> {
    const uid = this.assertConnected();
    const startTime = Date.now();

    try {
      const result = await this.transport.execute(
        this.connection.database,
        uid,
        this.connection.apiKey,
        model,
        method,
        args,
        kwargs,
      );
      this.logger.debug(`${model}.${method} took ${Date.now() - startTime}ms`);
      return result;
    } catch (error) {
      this.logger.error(
        `Error executing ${method} on ${model}: ${errorMessage(error)}`,
      );
      throw new RemoteCallError(model, method, error);
    }
  }
}
