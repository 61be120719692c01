export { registerCacheCommand } from "./cache";
export { registerColorsCommand } from "./colors";
export { registerOptionsCommand } from "./options";
export { registerRenderCommand } from "./render";
export { registerThemesCommand } from "./themes";
