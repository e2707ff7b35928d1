import type { Row, SqlConnection } from "../types";
import { ProvisioningError } from "../errors";
import { SqlErrorHandler } from "../utils/error-handler";

const errorHandler = new SqlErrorHandler();

/**
 * Runs one statement; anything that is not already a provisioning error
 * comes out as a SqlExecutionError carrying the server text.
 */
export async function executeStatement(
  connection: SqlConnection,
  statement: string,
  parameters?: unknown[]
): Promise<Row[]> {
  try {
    return await connection.execute(statement, parameters);
  } catch (error: unknown) {
    if (error instanceof ProvisioningError) {
      throw error;
    }
    throw errorHandler.wrapSqlException(error, statement);
  }
}
