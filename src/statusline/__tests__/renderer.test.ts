import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { MemoryCacheStore, type CacheStore } from "../../cache/store";
import { FakeHost, isolateCacheDir } from "../../__tests__/helpers";
import { ColorResolver } from "../colors";
import { DEFAULT_RENDER_OPTIONS } from "../compositor";
import { MapOptionSource, OptionRegistry } from "../options";
import { cleanContent, missingDependencyMessage, StatusRenderer } from "../renderer";
import { WidgetRegistry } from "../widgets";
import { declareThresholdOptions, firstInteger, thresholdDisplayInfo } from "../widgets/display";
import type { DependencyAware, DisplayInfoProvider, Widget } from "../widgets/types";

const R = "\ue0b2";
const L = "\ue0b6";

const palette = {
  secondary: "#3b4261",
  active: "#7aa2f7",
  error: "#f7768e",
  warning: "#e0af68",
  surface: "#292e42",
  background: "#1a1b26",
  "statusbar-bg": "#292e42",
};

const E = "#f7768e";
const ES = "#f88fa3";
const EK = "#89414f";
const S = "#3b4261";
const A = "#7aa2f7";
const W = "#ffffff";

function gauge(name: string, content: string, mode: "normal" | "inverted" = "normal"): Widget & DisplayInfoProvider {
  return {
    name,
    getType: () => "conditional",
    declareOptions(declare) {
      declareThresholdOptions(declare, mode === "normal" ? { mode, warning: 70, critical: 90 } : { mode, warning: 50, critical: 30 });
    },
    async produce() {
      return content;
    },
    getDisplayInfo(value, context) {
      return thresholdDisplayInfo(value, firstInteger(value), context.options);
    },
  };
}

function text(name: string, content: string): Widget {
  return {
    name,
    getType: () => "static",
    declareOptions() {},
    async produce() {
      return content;
    },
  };
}

interface Setup {
  renderer: StatusRenderer;
  host: FakeHost;
  registry: OptionRegistry;
}

function setup(
  widgets: Widget[],
  overrides: Record<string, Record<string, string>> = {},
  host = new FakeHost(),
  cache: CacheStore = new MemoryCacheStore()
): Setup {
  const registry = new OptionRegistry(new MapOptionSource(overrides));
  const renderer = new StatusRenderer({
    options: registry,
    widgets: new WidgetRegistry(widgets),
    colors: new ColorResolver(palette),
    cache,
    host,
    renderOptions: DEFAULT_RENDER_OPTIONS,
    cwd: "/tmp",
  });
  return { renderer, host, registry };
}

describe("StatusRenderer", () => {
  let restore: () => void;

  before(() => {
    ({ restore } = isolateCacheDir());
  });

  after(() => restore());

  it("renders threshold-colored and plain widgets in order", async () => {
    const { renderer } = setup([gauge("cpu", "95%"), gauge("battery", "discharging:15%", "inverted"), text("git", "main")]);
    const output = await renderer.render("cpu;battery;git");
    assert.equal(
      output,
      `#[fg=${ES},bg=#292e42]${L}#[none]#[fg=${EK},bg=${ES},bold] #[fg=${E},bg=${ES}]${R}#[none]#[fg=${EK},bg=${E},bold] 95% #[none]` +
        `#[fg=${ES},bg=${E}]${R}#[none]#[fg=${EK},bg=${ES},bold] #[fg=${E},bg=${ES}]${R}#[none]#[fg=${EK},bg=${E},bold] 15% #[none]` +
        `#[fg=${A},bg=${E}]${R}#[none]#[fg=${W},bg=${A},bold] #[fg=${S},bg=${A}]${R}#[none]#[fg=${W},bg=${S},bold] main `
    );
  });

  it("leaves hidden widgets out entirely", async () => {
    const { renderer } = setup([gauge("cpu", "10%"), text("git", "main")], { cpu: { show_only_warning: "on" } });
    assert.equal(
      await renderer.render("cpu;git"),
      `#[fg=${A},bg=#292e42]${L}#[none]#[fg=${W},bg=${A},bold] #[fg=${S},bg=${A}]${R}#[none]#[fg=${W},bg=${S},bold] main `
    );
  });

  it("applies the display_condition rule", async () => {
    const { renderer } = setup([gauge("cpu", "75%"), gauge("memory", "95%")], {
      cpu: { display_condition: "gte", display_threshold: "error" },
      memory: { display_condition: "gte", display_threshold: "error" },
    });
    const segments = await renderer.buildSegments("cpu;memory");
    assert.deepEqual(
      segments.map((segment) => segment.name),
      ["memory"]
    );
  });

  it("never hides a widget whose entry marks it static", async () => {
    const { renderer } = setup([gauge("cpu", "10%")], { cpu: { show_only_warning: "true" } });
    const segments = await renderer.buildSegments("cpu::::static");
    assert.equal(segments.length, 1);
    assert.equal(segments[0]?.hasThreshold, false);
  });

  it("keeps static widgets visible but applies their colors", async () => {
    const stubborn: Widget & DisplayInfoProvider = {
      ...text("load", "9.00"),
      getDisplayInfo: () => ({ visible: false, accent: "warning", accentIcon: "error", icon: "!" }),
    };
    const { renderer } = setup([stubborn]);
    const [segment] = await renderer.buildSegments("load");
    assert.deepEqual(segment, {
      name: "load",
      content: "9.00",
      icon: "!",
      accentColor: "#e0af68",
      accentIconColor: E,
      accentStrongColor: "#7c613a",
      accentSubtleColor: "#e5be84",
      hasThreshold: true,
    });
  });

  it("uses the entry's colors and icon over widget options", async () => {
    const { renderer } = setup([text("git", "main")], { git: { accent_color: "active" } });
    const [segment] = await renderer.buildSegments("git:error:warning:G");
    assert.equal(segment?.accentColor, E);
    assert.equal(segment?.accentIconColor, "#e0af68");
    assert.equal(segment?.icon, "G");
    assert.equal(segment?.hasThreshold, false);
  });

  it("renders unresolvable entry colors as empty", async () => {
    const { renderer } = setup([text("git", "main")]);
    const [segment] = await renderer.buildSegments("git:toString:constructor:");
    assert.equal(segment?.accentColor, "");
    assert.equal(segment?.accentIconColor, "");
    assert.equal(segment?.accentStrongColor, "");
    assert.equal(segment?.accentSubtleColor, "");
  });

  it("marks a severity color that differs from the entry accent", async () => {
    const { renderer } = setup([gauge("cpu", "95%")]);
    const [segment] = await renderer.buildSegments("cpu:warning");
    assert.equal(segment?.accentColor, E);
    assert.equal(segment?.hasThreshold, true);
  });

  it("strips internal status prefixes from content", async () => {
    const { renderer } = setup([text("battery", "charging:85%"), text("git", "MODIFIED:main ~2")]);
    const segments = await renderer.buildSegments("battery;git");
    assert.deepEqual(
      segments.map((segment) => segment.content),
      ["85%", "main ~2"]
    );
  });

  it("skips empty content and unknown widgets", async () => {
    const { renderer } = setup([text("empty", ""), text("git", "main")]);
    const segments = await renderer.buildSegments("empty;nope;git");
    assert.deepEqual(
      segments.map((segment) => segment.name),
      ["git"]
    );
  });

  it("isolates a failing widget", async () => {
    const broken: Widget = {
      ...text("broken", ""),
      async produce() {
        throw new Error("sensor unavailable");
      },
    };
    const { renderer } = setup([broken, text("git", "main")]);
    const segments = await renderer.buildSegments("broken;git");
    assert.deepEqual(
      segments.map((segment) => segment.name),
      ["git"]
    );
  });

  it("skips a widget with missing dependencies and notifies once", async () => {
    let produced = 0;
    const needy: Widget & DependencyAware = {
      ...text("needy", "x"),
      checkDependencies: (deps) => deps.requireCommand("sensors") && deps.requireCommand("jq"),
      async produce() {
        produced++;
        return "x";
      },
    };
    const { renderer, host } = setup([needy], {}, new FakeHost({ commands: ["jq"] }));
    assert.equal(await renderer.render("needy"), "");
    assert.equal(await renderer.render("needy"), "");
    assert.equal(produced, 0);
    assert.deepEqual(host.messages, ["statuskit: widget 'needy' disabled - missing: sensors"]);
  });

  it("renders a widget whose missing dependency is optional", async () => {
    const relaxed: Widget & DependencyAware = {
      ...text("relaxed", "ok"),
      checkDependencies: (deps) => deps.requireCommand("pmset", true),
    };
    const { renderer, host } = setup([relaxed]);
    const segments = await renderer.buildSegments("relaxed");
    assert.equal(segments.length, 1);
    assert.deepEqual(host.messages, []);
  });

  it("declares a widget's options once", async () => {
    const { renderer, registry } = setup([gauge("cpu", "10%")]);
    await renderer.buildSegments("cpu;cpu");
    assert.deepEqual(
      registry.getDeclaredOptions("cpu").map((option) => option.name),
      ["threshold_mode", "warning_threshold", "critical_threshold", "show_only_warning"]
    );
  });

  it("renders cached external entries", async () => {
    let now = 1_000_000;
    const cache = new MemoryCacheStore(() => now);
    const host = new FakeHost({ shell: { load: "0.42" } });
    const { renderer } = setup([], {}, host, cache);
    const line = "EXTERNAL|X|#(load)|warning||30|load";

    const [segment] = await renderer.buildSegments(line);
    assert.deepEqual(segment, {
      name: "load",
      content: "0.42",
      icon: "X",
      accentColor: "#e0af68",
      accentIconColor: A,
      accentStrongColor: "#7c613a",
      accentSubtleColor: "#e5be84",
      hasThreshold: false,
    });

    now += 10_000;
    await renderer.buildSegments(line);
    assert.equal(host.shellCalls.length, 1);
  });
});

describe("cleanContent", () => {
  it("removes a lowercase state prefix and the modified marker", () => {
    assert.equal(cleanContent("charging:85%"), "85%");
    assert.equal(cleanContent("MODIFIED:main ~1"), "main ~1");
    assert.equal(cleanContent("12:30"), "12:30");
    assert.equal(cleanContent("plain"), "plain");
  });
});

describe("missingDependencyMessage", () => {
  it("names the widget and every missing command", () => {
    assert.equal(
      missingDependencyMessage("git", ["git", "one of: a b"]),
      "statuskit: widget 'git' disabled - missing: git one of: a b"
    );
  });
});
