import type { ProvisioningErrorCode } from "../types/provisioning-result";

/**
 * Base error class for all provisioning errors.
 * Provides structured error information with code, context, and query details.
 * 
 * @public
 */
export class ProvisioningError extends Error {
  readonly code: ProvisioningErrorCode;
  readonly cause?: Error;
  readonly query?: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ProvisioningErrorCode,
    options?: {
      cause?: Error;
      query?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "ProvisioningError";
    this.code = code;
    this.cause = options?.cause;
    this.query = options?.query;
    this.context = options?.context;

    const ErrorConstructor = Error as unknown as {
      captureStackTrace?: (error: Error, constructor: typeof ProvisioningError) => void;
    };
    if (typeof ErrorConstructor.captureStackTrace === "function") {
      ErrorConstructor.captureStackTrace(this, ProvisioningError);
    }
  }
}

/**
 * Error thrown when the configuration record is missing required fields
 * or has fields of the wrong type.
 * 
 * @public
 */
export class InvalidConfigError extends ProvisioningError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, "INVALID_CONFIG", { context: { ...context, issues } });
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

/**
 * Error thrown when a connection cannot be established (network, auth, timeout).
 * Not retried here; callers decide on retry.
 * 
 * @public
 */
export class ProvisioningConnectionError extends ProvisioningError {
  readonly database: string;

  constructor(message: string, database: string, cause?: Error) {
    super(message, "CONNECTION_ERROR", { cause, context: { database } });
    this.name = "ProvisioningConnectionError";
    this.database = database;
  }
}

/**
 * Error thrown when the target database already exists and the caller
 * asked for creation to be exclusive.
 * 
 * @public
 */
export class DatabaseAlreadyExistsError extends ProvisioningError {
  readonly database: string;

  constructor(database: string, cause?: Error) {
    super(`Database "${database}" already exists`, "DATABASE_ALREADY_EXISTS", {
      cause,
      context: { database },
    });
    this.name = "DatabaseAlreadyExistsError";
    this.database = database;
  }
}

/**
 * Error thrown when an extension needs a schema that is missing from
 * the configured search path. Raised before any SQL is sent.
 * 
 * @public
 */
export class SchemaSearchPathError extends ProvisioningError {
  constructor(extension: string, requiredSchema: string, searchPath: readonly string[]) {
    super(
      `'${requiredSchema}' must be in schema_search_path for ${extension}`,
      "SCHEMA_SEARCH_PATH",
      { context: { extension, requiredSchema, searchPath: [...searchPath] } }
    );
    this.name = "SchemaSearchPathError";
  }
}

/**
 * Error thrown when the server rejects a statement.
 * Keeps the server message and SQLSTATE for diagnostics.
 * 
 * @public
 */
export class SqlExecutionError extends ProvisioningError {
  readonly serverMessage: string;
  readonly sqlState?: string;

  constructor(
    message: string,
    serverMessage: string,
    options?: { query?: string; sqlState?: string; cause?: Error }
  ) {
    super(message, "SQL_EXECUTION", {
      cause: options?.cause,
      query: options?.query,
      context: { sqlState: options?.sqlState },
    });
    this.name = "SqlExecutionError";
    this.serverMessage = serverMessage;
    this.sqlState = options?.sqlState;
  }
}

/**
 * Error thrown when pg_dump or psql exits unsuccessfully.
 * 
 * @public
 */
export class DumpToolError extends ProvisioningError {
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(command: string, stderr: string, exitCode?: number, cause?: Error) {
    super(
      `${command} failed${exitCode === undefined ? "" : ` with exit code ${exitCode}`}: ${stderr.trim() || "no output"}`,
      "DUMP_TOOL",
      { cause, context: { command, exitCode } }
    );
    this.name = "DumpToolError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
