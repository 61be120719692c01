export * from "./schema";
export { applyHostOverrides, getConfigPaths, loadConfig, resolveCacheDirectory } from "./loader";
