import type { Logger } from "pino";
import type { SqlConnection } from "../types";

/**
 * Opens a connection, hands it to `work`, and closes it on every exit path.
 * 
 * A failing close never replaces the outcome of `work`: it is logged, and
 * either the result is returned or the original error is rethrown.
 */
export async function withConnection<T>(
  open: () => Promise<SqlConnection>,
  logger: Logger,
  work: (connection: SqlConnection) => Promise<T>
): Promise<T> {
  const connection = await open();
  try {
    return await work(connection);
  } finally {
    await closeQuietly(connection, logger);
  }
}

async function closeQuietly(connection: SqlConnection, logger: Logger): Promise<void> {
  try {
    await connection.close();
  } catch (closeError) {
    logger.warn({ err: closeError, database: connection.database }, "failed to close connection");
  }
}
