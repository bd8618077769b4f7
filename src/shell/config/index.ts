export { DEFAULT_TARGET, parseCLIArgs, usage } from "./cli.js";
export { CONFIG_FILE_NAME, decodeConfig, loadVerifierConfig } from "./loader.js";
