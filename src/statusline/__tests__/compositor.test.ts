import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_RENDER_OPTIONS, render, segmentFill, type RenderOptions, type Segment } from "../compositor";

const R = "\ue0b2";
const L = "\ue0b6";

const cpu: Segment = {
  name: "cpu",
  content: "12%",
  icon: "C",
  accentColor: "#111111",
  accentIconColor: "#222222",
  hasThreshold: false,
};

const git: Segment = {
  name: "git",
  content: "x",
  icon: "B",
  accentColor: "#333333",
  accentIconColor: "#444444",
  hasThreshold: false,
};

const cpuPill =
  `#[fg=#ffffff,bg=#222222,bold]C #[fg=#111111,bg=#222222]${R}#[none]` + `#[fg=#ffffff,bg=#111111,bold] 12% `;
const gitPill =
  `#[fg=#ffffff,bg=#444444,bold]B #[fg=#333333,bg=#444444]${R}#[none]` + `#[fg=#ffffff,bg=#333333,bold] x `;

function options(overrides: Partial<RenderOptions>): RenderOptions {
  return { ...DEFAULT_RENDER_OPTIONS, ...overrides };
}

describe("render", () => {
  it("returns an empty string for no segments", () => {
    assert.equal(render([]), "");
  });

  it("renders a single pill with a rounded leading edge", () => {
    assert.equal(render([cpu]), `#[fg=#222222,bg=#292e42]${L}#[none]${cpuPill}`);
  });

  it("uses the right-pointing glyph for the normal separator style", () => {
    assert.equal(render([cpu], options({ separatorStyle: "normal" })), `#[fg=#222222,bg=#292e42]${R}#[none]${cpuPill}`);
  });

  it("chains separators from the previous content background", () => {
    assert.equal(
      render([cpu, git]),
      `#[fg=#222222,bg=#292e42]${L}#[none]${cpuPill}#[none]` + `#[fg=#444444,bg=#111111]${R}#[none]${gitPill}`
    );
  });

  it("inserts a surface-colored gap when spacing is on", () => {
    const output = render([cpu, git], options({ spacing: "both", surfaceColor: "#1e1e2e" }));
    assert.equal(
      output,
      `#[fg=#222222,bg=#292e42]${L}#[none]${cpuPill}#[none]` +
        ` #[fg=#1e1e2e,bg=#111111]${R}#[bg=#1e1e2e]#[none]` +
        `#[fg=#444444,bg=#1e1e2e]${R}#[none]${gitPill}`
    );
  });

  it("uses the terminal default background when transparent", () => {
    const output = render(
      [cpu, git],
      options({ transparent: true, spacing: "widgets", surfaceColor: "#1e1e2e", backgroundColor: "#000001" })
    );
    assert.equal(
      output,
      `#[fg=#222222,bg=default]${L}#[none]${cpuPill}#[none]` +
        ` #[fg=#000001,bg=#111111]${R}#[bg=default]#[none]` +
        `#[fg=#444444,bg=default]${R}#[none]${gitPill}`
    );
  });

  it("takes custom separator glyphs", () => {
    const output = render([cpu], options({ separators: { right: "<", leftRounded: "(" } }));
    assert.ok(output.startsWith("#[fg=#222222,bg=#292e42](#[none]"));
  });

  it("renders the threshold triad", () => {
    const hot: Segment = {
      name: "cpu",
      content: "95%",
      icon: "",
      accentColor: "#f7768e",
      accentIconColor: "#7aa2f7",
      accentStrongColor: "#89414f",
      accentSubtleColor: "#f88fa3",
      hasThreshold: true,
    };
    assert.equal(
      render([hot]),
      `#[fg=#f88fa3,bg=#292e42]${L}#[none]` +
        `#[fg=#89414f,bg=#f88fa3,bold] #[fg=#f7768e,bg=#f88fa3]${R}#[none]` +
        `#[fg=#89414f,bg=#f7768e,bold] 95% `
    );
  });
});

describe("segmentFill", () => {
  it("uses the icon color and text color without a threshold", () => {
    assert.deepEqual(segmentFill(cpu, "#ffffff"), { iconBg: "#222222", contentBg: "#111111", textFg: "#ffffff" });
  });

  it("falls back to the normal fill when the subtle color is missing", () => {
    const segment: Segment = { ...cpu, hasThreshold: true, accentStrongColor: "#000000" };
    assert.deepEqual(segmentFill(segment, "#ffffff"), { iconBg: "#222222", contentBg: "#111111", textFg: "#ffffff" });
  });

  it("renders missing colors as empty", () => {
    const bare: Segment = { name: "x", content: "y", icon: "", hasThreshold: false };
    assert.deepEqual(segmentFill(bare, "#ffffff"), { iconBg: "", contentBg: "", textFg: "#ffffff" });
  });
});
