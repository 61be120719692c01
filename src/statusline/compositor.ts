/**
 * Segment compositor
 *
 * Turns an ordered list of resolved segments into one tmux status string.
 * Each segment is a pill: leading separator, icon block, a separator into the
 * content block, then the content. Every separator's background is the
 * background of the block right before it.
 */

export interface Segment {
  name: string;
  content: string;
  icon: string;
  // Concrete colors (hex, "default", "NONE"). Missing colors render as "".
  accentColor?: string;
  accentIconColor?: string;
  accentStrongColor?: string;
  accentSubtleColor?: string;
  hasThreshold: boolean;
}

export type SeparatorStyle = "rounded" | "normal";

export type ElementsSpacing = "none" | "both" | "widgets";

export interface SeparatorGlyphs {
  right: string;
  leftRounded: string;
}

export const DEFAULT_SEPARATORS: SeparatorGlyphs = {
  right: "\ue0b2",
  leftRounded: "\ue0b6",
};

export const FALLBACK_STATUS_BG = "#292e42";
export const FALLBACK_TEXT_COLOR = "#ffffff";

export interface RenderOptions {
  statusBackground: string;
  transparent: boolean;
  separatorStyle: SeparatorStyle;
  spacing: ElementsSpacing;
  textColor: string;
  // Gap fill between segments when spacing is on
  surfaceColor: string;
  // Gap separator color in transparent mode
  backgroundColor: string;
  separators?: SeparatorGlyphs;
}

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  statusBackground: FALLBACK_STATUS_BG,
  transparent: false,
  separatorStyle: "rounded",
  spacing: "none",
  textColor: FALLBACK_TEXT_COLOR,
  surfaceColor: "",
  backgroundColor: "",
};

interface SegmentFill {
  iconBg: string;
  contentBg: string;
  textFg: string;
}

/**
 * Pick the icon/content/text colors for one segment. Threshold-colored
 * segments use the subtle/strong triad when a subtle color exists.
 */
export function segmentFill(segment: Segment, textColor: string): SegmentFill {
  const accent = segment.accentColor ?? "";
  const subtle = segment.accentSubtleColor ?? "";
  if (segment.hasThreshold && subtle !== "") {
    return { iconBg: subtle, contentBg: accent, textFg: segment.accentStrongColor ?? "" };
  }
  return { iconBg: segment.accentIconColor ?? "", contentBg: accent, textFg: textColor };
}

function spacingEnabled(spacing: ElementsSpacing): boolean {
  return spacing === "both" || spacing === "widgets";
}

export function render(segments: readonly Segment[], options: RenderOptions = DEFAULT_RENDER_OPTIONS): string {
  if (segments.length === 0) return "";

  const glyphs = options.separators ?? DEFAULT_SEPARATORS;
  const last = segments.length - 1;
  let output = "";
  let prevBg = "";

  segments.forEach((segment, i) => {
    if (i > 0 && spacingEnabled(options.spacing)) {
      const gapBg = options.transparent ? "default" : options.surfaceColor;
      const gapFg = options.transparent ? options.backgroundColor : options.surfaceColor;
      output += ` #[fg=${gapFg},bg=${prevBg}]${glyphs.right}#[bg=${gapBg}]#[none]`;
      prevBg = gapBg;
    }

    const { iconBg, contentBg, textFg } = segmentFill(segment, options.textColor);

    if (i === 0) {
      const edgeBg = options.transparent ? "default" : options.statusBackground;
      const glyph = options.separatorStyle === "rounded" ? glyphs.leftRounded : glyphs.right;
      output += `#[fg=${iconBg},bg=${edgeBg}]${glyph}#[none]`;
    } else {
      output += `#[fg=${iconBg},bg=${prevBg}]${glyphs.right}#[none]`;
    }

    output += `#[fg=${textFg},bg=${iconBg},bold]${segment.icon} `;
    output += `#[fg=${contentBg},bg=${iconBg}]${glyphs.right}#[none]`;
    output += `#[fg=${textFg},bg=${contentBg},bold] ${segment.content} `;
    if (i !== last) {
      output += "#[none]";
    }

    prevBg = contentBg;
  });

  return output;
}
