export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type OdooOperator =
  | '='
  | '!='
  | '>'
  | '>='
  | '<'
  | '<='
  | 'in'
  | 'not in'
  | 'like'
  | 'ilike'
  | 'child_of';

export type OdooCondition = [
  field: string,
  operator: OdooOperator,
  value: JsonPrimitive | JsonPrimitive[],
];

export type OdooDomain = Array<OdooCondition | '&' | '|' | '!'>;

/** Field values for create/write; undefined entries are dropped on the wire. */
export type OdooValues = { [field: string]: JsonValue | undefined };

export interface OdooRecord {
  id: number;
  [field: string]: unknown;
}

export interface SearchReadOptions {
  fields?: string[];
  limit?: number;
  offset?: number;
  order?: string;
}

/** Generic object-RPC transport: `common.authenticate` and `object.execute_kw`. */
export interface OdooTransport {
  authenticate(db: string, login: string, secret: string): Promise<number | false>;
  execute(
    db: string,
    uid: number,
    secret: string,
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown>,
  ): Promise<unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: {
    name?: string;
    message?: string;
    debug?: string;
  };
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: unknown;
  error?: JsonRpcError;
}

export function isOdooRecord(value: unknown): value is OdooRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number'
  );
}
