// Connection type definitions

/**
 * A row returned by a catalog query.
 *
 * @public
 */
export type Row = Record<string, unknown>;

/**
 * Everything needed to open one connection.
 *
 * @public
 */
export interface ConnectionDescriptor {
  host: string;
  port: number;
  database: string;
  username?: string;
  password?: string;
  searchPath: readonly string[];
  connectTimeoutMs: number;
  statementTimeoutMs: number;
}

/**
 * An open connection, owned by whichever component opened it.
 *
 * Connections are never shared; the owner must `close()` on every exit path.
 *
 * @public
 */
export interface SqlConnection {
  readonly database: string;
  execute(statement: string, parameters?: unknown[]): Promise<Row[]>;
  close(): Promise<void>;
}

/**
 * Opens connections from descriptors.
 *
 * @public
 */
export interface ConnectionFactory {
  open(descriptor: ConnectionDescriptor): Promise<SqlConnection>;
}
