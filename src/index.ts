/**
 * PostGIS database tasks for TypeORM
 * 
 * Creates PostgreSQL databases through a privileged connection and
 * installs PostGIS extensions into them, accepting either a TypeORM
 * DataSourceOptions record or a flat database.yml-style record.
 * 
 * @example
 * ```typescript
 * import { createDatabaseTasks } from "typeorm-postgis-tasks";
 * 
 * const tasks = createDatabaseTasks({
 *   adapter: "postgis",
 *   database: "geo_db",
 *   username: "app",
 *   password: "app-password",
 *   su_username: "postgres",
 *   su_password: "postgres-password",
 *   postgis_extension: "postgis,postgis_topology",
 *   schema_search_path: "public,topology",
 * });
 * 
 * const result = await tasks.create();
 * if (result.status === "failed") {
 *   throw result.error;
 * }
 * ```
 */

import "reflect-metadata";

// Task exports
export * from "./tasks";

// Factory exports
export { createDatabaseTasks, registerDefaultTasks } from "./factory";

// Config exports
export * from "./config";

// Connection exports
export * from "./connection";

// Type exports
export * from "./types";

// Error exports
export * from "./errors";

// Logging exports
export { makeLogger, makeNoopLogger, type Logger } from "./logging";

// Utils exports (internal, but exported for advanced usage)
export {
  DatabaseTasksRegistry,
  SqlErrorHandler,
  SqlBuilder,
  ProvisioningGuards,
  CONSTANTS,
  type CreateDatabaseOptions,
  type BoundStatement,
} from "./utils";

// CLI exports
export { runCli, parseArgs } from "./cli";
