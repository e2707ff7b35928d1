// Error exports

export {
  ProvisioningError,
  InvalidConfigError,
  ProvisioningConnectionError,
  DatabaseAlreadyExistsError,
  SchemaSearchPathError,
  SqlExecutionError,
  DumpToolError,
} from "./ProvisioningError";
