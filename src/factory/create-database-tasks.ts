// Database tasks factory function

import { resolveConfig } from "../config/config-resolver";
import { PostgisDatabaseTasks, type DatabaseTasks, type DatabaseTasksOptions } from "../tasks/postgis-database-tasks";
import { DatabaseTasksRegistry } from "../utils/task-registry";
import { ProvisioningGuards } from "../utils/guards";

const POSTGIS_ADAPTER = /postgis/;

/**
 * Registers the built-in PostGIS tasks unless something already serves
 * `/postgis/`, so a caller's own registration is left in place.
 */
export function registerDefaultTasks(): void {
  if (!DatabaseTasksRegistry.isRegistered(POSTGIS_ADAPTER)) {
    DatabaseTasksRegistry.register(POSTGIS_ADAPTER, PostgisDatabaseTasks);
  }
}

registerDefaultTasks();

/**
 * Resolves a raw configuration record and builds the task class
 * registered for its adapter.
 * 
 * Records without an `adapter` key (TypeORM DataSourceOptions style)
 * are treated as `postgis`.
 * 
 * @example
 * ```typescript
 * import { createDatabaseTasks } from "typeorm-postgis-tasks";
 * 
 * const tasks = createDatabaseTasks({
 *   type: "postgres",
 *   database: "geo_db",
 *   username: "app",
 *   postgis: { superuser: { username: "postgres" }, extensionSchema: "gis" },
 * });
 * await tasks.create();
 * ```
 * 
 * @throws {InvalidConfigError} If the record is invalid or its adapter has no tasks
 * 
 * @public
 */
export function createDatabaseTasks(
  raw: unknown,
  options: DatabaseTasksOptions = {}
): DatabaseTasks {
  registerDefaultTasks();

  const config = resolveConfig(raw);
  const adapter =
    ProvisioningGuards.isRecord(raw) && typeof raw.adapter === "string" ? raw.adapter : "postgis";
  const Tasks = DatabaseTasksRegistry.resolve(adapter);
  return new Tasks(config, options);
}
