// Tasks module exports

export {
  PostgisDatabaseTasks,
  type DatabaseTasks,
  type DatabaseTasksClass,
  type DatabaseTasksOptions,
  type CreateOptions,
} from "./postgis-database-tasks";
export {
  connectAsAdmin,
  connectToTarget,
  adminDescriptor,
  targetDescriptor,
} from "./admin-connector";
export { createDatabase, createDatabaseStatement, dropDatabase } from "./database-creator";
export { installExtensions, schemaExists } from "./extension-installer";
export {
  ExecFileCommandRunner,
  structureDump,
  structureLoad,
  structureDumpArgs,
  structureLoadArgs,
  dumpToolEnv,
  dumpSchemas,
  type CommandRunner,
  type CommandResult,
} from "./structure-tasks";
