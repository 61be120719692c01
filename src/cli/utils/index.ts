export { createFormatters, type Colors, type Formatters } from "./colors";
export { loadRuntime } from "./runtime";
