export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
export type { AppConfig, ConfigOverrides, Credentials, RunConfig } from "./types";
