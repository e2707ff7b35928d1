export { createDatabaseTasks, registerDefaultTasks } from "./create-database-tasks";
