import { SqlExecutionError } from "../errors";
import { CONSTANTS } from "./constants";

const DATABASE_EXISTS_PATTERN = /database .* already exists/;

/**
 * Extracts, classifies and formats errors raised by the PostgreSQL driver.
 * 
 * TypeORM wraps pg errors in QueryFailedError, keeping the original
 * under `driverError`, so lookups check both levels.
 * 
 * @internal
 */
export class SqlErrorHandler {
  /**
   * Extracts error message from various error formats.
   * 
   * @param error - The error object
   * @returns Extracted error message
   */
  extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (error && typeof error === "object" && "message" in error) {
      return String(error.message);
    }
    return String(error);
  }

  /**
   * Extracts the SQLSTATE code, if the server sent one.
   */
  extractSqlState(error: unknown): string | undefined {
    if (!error || typeof error !== "object") {
      return undefined;
    }
    if ("driverError" in error) {
      const nested = this.extractSqlState(error.driverError);
      if (nested) {
        return nested;
      }
    }
    if ("code" in error && typeof error.code === "string" && /^[0-9A-Z]{5}$/.test(error.code)) {
      return error.code;
    }
    return undefined;
  }

  /**
   * Whether the server reported that the database being created already exists.
   */
  isDatabaseAlreadyExists(error: unknown): boolean {
    if (error instanceof SqlExecutionError) {
      return (
        error.sqlState === CONSTANTS.DUPLICATE_DATABASE_SQLSTATE ||
        DATABASE_EXISTS_PATTERN.test(error.serverMessage)
      );
    }
    return (
      this.extractSqlState(error) === CONSTANTS.DUPLICATE_DATABASE_SQLSTATE ||
      DATABASE_EXISTS_PATTERN.test(this.extractErrorMessage(error))
    );
  }

  /**
   * Builds a formatted error message with query context.
   * 
   * @param errorMessage - The base error message
   * @param query - Optional SQL query for context
   */
  buildErrorMessage(errorMessage: string, query?: string): string {
    let message = `PostgreSQL Error: ${errorMessage}`;
    if (query) {
      const queryPreview = query.length > CONSTANTS.QUERY_PREVIEW_MAX_LENGTH
        ? query.substring(0, CONSTANTS.QUERY_PREVIEW_MAX_LENGTH) + "..."
        : query;
      message += `\nQuery: ${queryPreview}`;
    }
    return message;
  }

  /**
   * Wraps a driver exception into a SqlExecutionError, keeping the server text.
   * 
   * @param error - The error object
   * @param query - Optional SQL query for context
   */
  wrapSqlException(error: unknown, query?: string): SqlExecutionError {
    if (error instanceof SqlExecutionError) {
      return error;
    }
    const serverMessage = this.extractErrorMessage(error);
    const wrappedError = new SqlExecutionError(
      this.buildErrorMessage(serverMessage, query),
      serverMessage,
      {
        query,
        sqlState: this.extractSqlState(error),
        cause: error instanceof Error ? error : undefined,
      }
    );

    if (error instanceof Error && error.stack) {
      wrappedError.stack = error.stack;
    }

    return wrappedError;
  }
}
