export { loadConfig } from "./config.js";
export type { AppConfig, Environment, LogLevel } from "./config.js";
