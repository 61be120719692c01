import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DependencyChecker } from "../dependencies";

const installed = new Set(["git", "curl"]);
const checker = () => new DependencyChecker((command) => installed.has(command));

describe("DependencyChecker", () => {
  it("passes when required commands exist", () => {
    const deps = checker();
    assert.equal(deps.requireCommand("git"), true);
    assert.deepEqual(deps.missing, []);
  });

  it("records missing required commands", () => {
    const deps = checker();
    assert.equal(deps.requireCommand("jq"), false);
    assert.deepEqual(deps.missing, ["jq"]);
  });

  it("records missing optional commands without failing", () => {
    const deps = checker();
    assert.equal(deps.requireCommand("pmset", true), true);
    assert.deepEqual(deps.missing, []);
    assert.deepEqual(deps.optionalMissing, ["pmset"]);
  });

  it("accepts any one of several alternatives", () => {
    const deps = checker();
    assert.equal(deps.requireAnyCommand("wget", "curl"), true);
    assert.equal(deps.requireAnyCommand("nvidia-smi", "rocm-smi"), false);
    assert.deepEqual(deps.missing, ["one of: nvidia-smi rocm-smi"]);
  });
});
