// Provisioning outcome type definitions

import type { SqlExecutionError } from "../errors";

/**
 * Outcome of a create-database attempt.
 *
 * `already_exists` is success-equivalent for idempotent provisioning.
 *
 * @public
 */
export type ProvisioningResult =
  | { status: "created" }
  | { status: "already_exists" }
  | { status: "failed"; reason: string; error: SqlExecutionError };

/**
 * States of the overall create operation.
 *
 * @public
 */
export type ProvisioningState =
  | "start"
  | "admin_connected"
  | "database_created"
  | "database_exists"
  | "target_connected"
  | "extensions_installed"
  | "done";

/**
 * Error codes carried by provisioning errors.
 *
 * @public
 */
export type ProvisioningErrorCode =
  | "INVALID_CONFIG"
  | "CONNECTION_ERROR"
  | "DATABASE_ALREADY_EXISTS"
  | "SCHEMA_SEARCH_PATH"
  | "SQL_EXECUTION"
  | "DUMP_TOOL";
