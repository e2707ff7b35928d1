export {
  resolveConfig,
  detectGeneration,
  dataSourceStrategy,
  legacyStrategy,
  type ConfigStrategy,
} from "./config-resolver";
export { loadConfigFile } from "./config-file";
export { normalizeExtensionList, normalizeNameList } from "./normalize";
