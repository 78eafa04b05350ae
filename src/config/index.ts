export * from "./types.js";
export { getConfigFromArgs } from "./cli.js";
