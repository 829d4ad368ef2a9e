export { HELP_TEXT, parseCLIArgs } from "./cli.js";
export { loadConfigOverrides, loadPipelineConfig } from "./loader.js";
