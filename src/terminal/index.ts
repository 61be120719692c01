export type { CommandOptions, CommandResult, HostName } from "./types";
export { BaseStatusHost, TmuxCommandError, type StatusHost } from "./base";
export { TmuxHost, parseShowOptions, unquoteOptionValue } from "./tmux";
export { OPTION_PREFIX, TmuxOptionSource, WIDGET_OPTION_PREFIX, widgetOptionName } from "./options";
