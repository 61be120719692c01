import { z } from "zod";
import { DEFAULT_THEME } from "../statusline/themes";

export const DEFAULT_WIDGETS = "cpu;memory;disk;git;datetime";

export const SeparatorStyleSchema = z.enum(["rounded", "normal"]);

/**
 * Spacing between segments. Older spellings are accepted:
 * false -> none, plugins / widgets-only -> widgets, windows -> none
 * (window spacing does not affect the widget area).
 */
export const ElementsSpacingSchema = z.preprocess((value) => {
  if (value === false) return "none";
  if (value === true) return "both";
  if (typeof value !== "string") return value;
  switch (value.trim().toLowerCase()) {
    case "":
    case "false":
    case "none":
    case "windows":
      return "none";
    case "true":
    case "both":
      return "both";
    case "plugins":
    case "widgets":
    case "widgets-only":
      return "widgets";
    default:
      return value;
  }
}, z.enum(["none", "both", "widgets"]));

const OptionValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const StatusKitConfigSchema = z.object({
  /** "<family>/<variant>" under themes/ */
  theme: z.string().default(DEFAULT_THEME),
  transparent: z.boolean().default(false),
  separatorStyle: SeparatorStyleSchema.default("rounded"),
  elementsSpacing: ElementsSpacingSchema.default("none"),
  /** Status bar background; falls back to the theme's statusbar-bg */
  statusBackground: z.string().optional(),
  /** Segment text color; falls back to the theme's white */
  textColor: z.string().optional(),
  /** Default config line, used when `render` gets none */
  widgets: z.string().default(DEFAULT_WIDGETS),
  cacheDirectory: z.string().optional(),
  /** Per-widget option overrides: { "<widget>": { "<option>": value } } */
  options: z.record(z.string(), z.record(z.string(), OptionValueSchema)).default({}),
});

export type StatusKitConfig = z.infer<typeof StatusKitConfigSchema>;
export type StatusKitConfigInput = z.input<typeof StatusKitConfigSchema>;

export const DEFAULT_CONFIG: StatusKitConfig = StatusKitConfigSchema.parse({});
