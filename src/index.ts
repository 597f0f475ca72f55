/**
 * Library entry: the alias model, its TOML store and the shell projection.
 */

export type { Alias, AliasConfig, Group, Outcome } from "./alias/types.js";
export { createAlias, createConfig, isDetailed } from "./alias/types.js";
export { assertValidName, isValidName } from "./alias/names.js";
export * from "./alias/operations.js";
export { loadConfig, saveConfig } from "./alias/store.js";
export { parseConfig, serializeConfig } from "./config/toml.js";
export { getConfigDir, getConfigPath, CONFIG_PATH_ENV_VAR } from "./config/paths.js";
export type { ShellType } from "./shell/detect.js";
export { detectShell, parseShell, SHELL_ENV_VAR } from "./shell/detect.js";
export type { AliasSection, GroupFilter, ListFilters } from "./shell/projector.js";
export {
  activeStatements,
  aliasStatement,
  diffStatements,
  selectAliases,
  syncScript,
  unaliasStatement,
} from "./shell/projector.js";
export { generateInitScript } from "./shell/init.js";
export { AliasmgrError, isAliasmgrError } from "./util/errors.js";
export type { AliasmgrErrorCode } from "./util/errors.js";
