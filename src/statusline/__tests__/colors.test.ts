import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ColorResolver, darken, generateVariants, lighten } from "../colors";

const palette = {
  error: "#f7768e",
  secondary: "#3b4261",
  custom: "default",
};

describe("lighten / darken", () => {
  it("moves channels toward white by tenths of a percent", () => {
    assert.equal(lighten("#000000", 189), "#303030");
    assert.equal(lighten("#ff0000", 100), "#ff1919");
  });

  it("moves channels toward black", () => {
    assert.equal(darken("#ffffff", 442), "#8e8e8e");
    assert.equal(darken("#000000", 442), "#000000");
  });

  it("accepts hex without the leading hash", () => {
    assert.equal(lighten("000000", 189), "#303030");
  });

  it("rejects non-hex input", () => {
    assert.equal(lighten("default", 100), undefined);
    assert.equal(darken("#fff", 100), undefined);
  });
});

describe("generateVariants", () => {
  it("creates six variants per hex color and none for other values", () => {
    const variants = generateVariants(palette);
    assert.equal(variants.size, 12);
    assert.equal(variants.get("error-lighter"), "#f88fa3");
    assert.equal(variants.get("error-darkest"), "#89414f");
    assert.equal(variants.has("custom-light"), false);
  });
});

describe("ColorResolver", () => {
  const colors = new ColorResolver(palette);

  it("resolves palette entries and universal colors", () => {
    assert.equal(colors.resolve("error"), "#f7768e");
    assert.equal(colors.resolve("white"), "#ffffff");
    assert.equal(colors.resolve("transparent"), "NONE");
    assert.equal(colors.resolve("custom"), "default");
  });

  it("maps subtle and strong onto generated variants", () => {
    assert.equal(colors.resolve("error-subtle"), "#f88fa3");
    assert.equal(colors.resolve("error-strong"), "#89414f");
    assert.equal(colors.resolve("error-subtle"), colors.resolve("error-lighter"));
  });

  it("passes literal colors through", () => {
    assert.equal(colors.resolve("#123abc"), "#123abc");
    assert.equal(colors.resolve("default"), "default");
    assert.equal(colors.resolve("colour235"), "colour235");
  });

  it("resolves unknown names to an empty string", () => {
    assert.equal(colors.resolve("warning"), "");
    assert.equal(colors.resolve("warning-subtle"), "");
    assert.equal(colors.resolve(""), "");
    assert.equal(colors.has("warning"), false);
    assert.equal(colors.has("secondary"), true);
  });

  it("does not resolve names inherited from Object", () => {
    assert.equal(colors.resolve("constructor"), "");
    assert.equal(colors.resolve("toString"), "");
    assert.equal(colors.resolve("__proto__"), "");
    assert.equal(colors.resolve("hasOwnProperty"), "");
    assert.equal(colors.resolve("error-constructor"), "");
    assert.equal(colors.has("toString"), false);
  });

  it("lets an explicit palette entry win over a generated variant", () => {
    const custom = new ColorResolver({ error: "#f7768e", "error-subtle": "#010203" });
    assert.equal(custom.resolve("error-subtle"), "#010203");
  });

  it("lists the palette by group", () => {
    const listing = colors.list();
    assert.deepEqual(listing.base, palette);
    assert.equal(listing.universal.black, "#000000");
    assert.equal(Object.keys(listing.variants).length, 12);
  });
});
