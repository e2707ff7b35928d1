// Utils module exports

export { SqlErrorHandler } from "./error-handler";
export { SqlBuilder, type CreateDatabaseOptions, type BoundStatement } from "./sql-builder";
export { DatabaseTasksRegistry } from "./task-registry";
export { ProvisioningGuards } from "./guards";
export { CONSTANTS } from "./constants";
