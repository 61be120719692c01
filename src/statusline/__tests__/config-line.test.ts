import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseConfigLine, parseExternalEntry, parseInternalEntry, parseWidgetType } from "../config-line";

describe("parseConfigLine", () => {
  it("keeps entry order and drops empty entries", () => {
    assert.deepEqual(parseConfigLine("cpu;; memory:warning:error:M:static ; "), [
      { kind: "internal", name: "cpu", accent: "", accentIcon: "", icon: "" },
      { kind: "internal", name: "memory", accent: "warning", accentIcon: "error", icon: "M", type: "static" },
    ]);
  });

  it("mixes internal and external entries", () => {
    const entries = parseConfigLine("git;EXTERNAL|I|hello|info||0;datetime");
    assert.deepEqual(
      entries.map((entry) => `${entry.kind}:${entry.name}`),
      ["internal:git", "external:external", "internal:datetime"]
    );
  });

  it("drops entries without a name or content", () => {
    assert.deepEqual(parseConfigLine(":warning;EXTERNAL|I||a|b|5"), []);
    assert.deepEqual(parseConfigLine(""), []);
  });
});

describe("parseInternalEntry", () => {
  it("reads dynamic as conditional and ignores unknown types", () => {
    assert.equal(parseInternalEntry("git::::dynamic")?.type, "conditional");
    assert.equal(parseInternalEntry("git::::weird")?.type, undefined);
  });
});

describe("parseExternalEntry", () => {
  it("reads every field", () => {
    assert.deepEqual(parseExternalEntry("EXTERNAL|I|#(echo hi)|info|info-subtle|30|greet|#(true)"), {
      kind: "external",
      name: "greet",
      icon: "I",
      content: "#(echo hi)",
      accent: "info",
      accentIcon: "info-subtle",
      ttlSeconds: 30,
      condition: "#(true)",
    });
  });

  it("treats a non-numeric ttl as no caching", () => {
    assert.equal(parseExternalEntry("EXTERNAL|I|x|||soon")?.ttlSeconds, 0);
    assert.equal(parseExternalEntry("EXTERNAL|I|x")?.ttlSeconds, 0);
  });
});

describe("parseWidgetType", () => {
  it("is case-insensitive", () => {
    assert.equal(parseWidgetType(" Static "), "static");
    assert.equal(parseWidgetType("CONDITIONAL"), "conditional");
    assert.equal(parseWidgetType(""), undefined);
  });
});
