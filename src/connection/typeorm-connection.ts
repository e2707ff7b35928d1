// TypeORM-backed connection handle

import type { Row, SqlConnection } from "../types";
import { ProvisioningConnectionError } from "../errors";
import { SqlErrorHandler } from "../utils/error-handler";
import { ProvisioningGuards } from "../utils/guards";

/** The part of a TypeORM DataSource a connection handle owns. */
export interface OwnedDataSource {
  readonly isInitialized: boolean;
  destroy(): Promise<void>;
}

/** The part of a TypeORM QueryRunner a connection handle uses. */
export interface OwnedQueryRunner {
  query(query: string, parameters?: unknown[]): Promise<unknown>;
  release(): Promise<void>;
}

/**
 * One TypeORM DataSource plus the single query runner taken from it.
 * 
 * Closing releases the query runner and destroys the DataSource, so a
 * handle never outlives the component that opened it.
 * 
 * @public
 */
export class TypeOrmConnection implements SqlConnection {
  private closed = false;
  private readonly errorHandler = new SqlErrorHandler();

  constructor(
    private readonly dataSource: OwnedDataSource,
    private readonly queryRunner: OwnedQueryRunner,
    readonly database: string
  ) {}

  /**
   * Executes a statement and returns its rows (empty for DDL).
   * 
   * @throws {SqlExecutionError} If the server rejects the statement
   * @throws {ProvisioningConnectionError} If the handle was already closed
   */
  async execute(statement: string, parameters?: unknown[]): Promise<Row[]> {
    if (this.closed) {
      throw new ProvisioningConnectionError(
        `Connection to "${this.database}" is closed`,
        this.database
      );
    }

    let result: unknown;
    try {
      result = await this.queryRunner.query(statement, parameters);
    } catch (error: unknown) {
      throw this.errorHandler.wrapSqlException(error, statement);
    }
    return Array.isArray(result) ? result.filter(ProvisioningGuards.isRecord) : [];
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.queryRunner.release();
    } finally {
      if (this.dataSource.isInitialized) {
        await this.dataSource.destroy();
      }
    }
  }
}
