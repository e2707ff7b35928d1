import type { ProvisioningConfig, ProvisioningResult, SqlConnection } from "../types";
import { SqlExecutionError } from "../errors";
import { SqlErrorHandler } from "../utils/error-handler";
import { SqlBuilder } from "../utils/sql-builder";
import { executeStatement } from "./execute";

const errorHandler = new SqlErrorHandler();

export function createDatabaseStatement(config: ProvisioningConfig): string {
  return SqlBuilder.createDatabase(config.databaseName, {
    encoding: config.encoding,
    owner: config.hasSuperuser ? config.ownerUsername : undefined,
    template: config.template,
    collation: config.collation,
    ctype: config.ctype,
    tablespace: config.tablespace,
    connectionLimit: config.connectionLimit,
  });
}

/**
 * Issues CREATE DATABASE over an admin connection.
 *
 * "Already exists" is reported as its own outcome; any other server
 * error comes back as `failed` with the server message as reason.
 * Connection errors are not outcomes and are thrown.
 */
export async function createDatabase(
  admin: SqlConnection,
  config: ProvisioningConfig
): Promise<ProvisioningResult> {
  const statement = createDatabaseStatement(config);
  try {
    await executeStatement(admin, statement);
    return { status: "created" };
  } catch (error) {
    if (!(error instanceof SqlExecutionError)) {
      throw error;
    }
    if (errorHandler.isDatabaseAlreadyExists(error)) {
      return { status: "already_exists" };
    }
    return { status: "failed", reason: error.serverMessage, error };
  }
}

/**
 * Issues DROP DATABASE IF EXISTS over an admin connection.
 *
 * @throws {SqlExecutionError} If the server refuses (e.g. open sessions)
 */
export async function dropDatabase(
  admin: SqlConnection,
  config: ProvisioningConfig
): Promise<void> {
  await executeStatement(admin, SqlBuilder.dropDatabase(config.databaseName));
}
