export type { ConfigData } from "./defaults";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
} from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides, getSource } from "./resolve";
export { initConfig } from "./runtime";
export { toSolveSettings, loadLayout } from "./settings";
export type { SolveSettings } from "./settings";
