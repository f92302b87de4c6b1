export { renderCmd } from "./commands/render.js";
export { checkCmd } from "./commands/check.js";
export { requestFromArgs } from "./commands/request.js";
export { runCommand, type CommandError, type CommandBody } from "./run.js";
export { resolveCliConfig, validateCliConfig, defaultCliConfig, DEFAULT_HEADER_GUARD, type CliConfig } from "./config.js";
export { parseKV, requireArg, strArg, boolArg, loadConfig } from "./parse.js";
