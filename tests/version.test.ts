import { describe, it, expect } from "vitest";
import { DslLogicError } from "../src/errors.js";
import { compareVersions } from "../src/model.js";
import {
  DSL_VERSION_1_0,
  DSL_VERSION_1_1,
  DSL_VERSION_1_2,
  parseDslVersion,
  parseSupportedDslVersion,
} from "../src/version.js";

function codeOf(work: () => unknown): number | undefined {
  try {
    work();
  } catch (err) {
    if (err instanceof DslLogicError) return err.code;
    throw err;
  }
  return undefined;
}

describe("parseDslVersion", () => {
  it("reads major, minor and an optional micro part", () => {
    expect(parseDslVersion("tosca_dsl_1_2")).toEqual({
      raw: "tosca_dsl_1_2",
      major: 1,
      minor: 2,
      micro: 0,
    });
    expect(parseDslVersion("tosca_dsl_3_4_5")).toEqual({
      raw: "tosca_dsl_3_4_5",
      major: 3,
      minor: 4,
      micro: 5,
    });
  });

  it("fails with 27 for a missing value", () => {
    expect(codeOf(() => parseDslVersion(undefined))).toBe(27);
    expect(codeOf(() => parseDslVersion(null))).toBe(27);
    expect(codeOf(() => parseDslVersion(""))).toBe(27);
  });

  it("fails with 71 for malformed values", () => {
    expect(codeOf(() => parseDslVersion(5))).toBe(71);
    expect(codeOf(() => parseDslVersion("dsl_1_0"))).toBe(71);
    expect(codeOf(() => parseDslVersion("tosca_dsl_1_2_3_4"))).toBe(71);
    expect(() => parseDslVersion("tosca_dsl_1_x")).toThrow(
      "Invalid tosca_definitions_version: 'tosca_dsl_1_x', " +
        "minor version is 'x' while expected to be a number"
    );
  });
});

describe("parseSupportedDslVersion", () => {
  it("accepts supported versions, with or without micro", () => {
    expect(parseSupportedDslVersion("tosca_dsl_1_1")).toEqual(DSL_VERSION_1_1);
    const withMicro = parseSupportedDslVersion("tosca_dsl_1_0_0");
    expect(withMicro.raw).toBe("tosca_dsl_1_0_0");
  });

  it("fails with 73 for unsupported versions", () => {
    expect(codeOf(() => parseSupportedDslVersion("tosca_dsl_1_3"))).toBe(73);
  });
});

describe("compareVersions", () => {
  it("orders by major, minor, then micro", () => {
    expect(compareVersions(DSL_VERSION_1_0, DSL_VERSION_1_1)).toBeLessThan(0);
    expect(compareVersions(DSL_VERSION_1_2, DSL_VERSION_1_1)).toBeGreaterThan(
      0
    );
    const zeroMicro = parseDslVersion("tosca_dsl_1_1_0");
    const oneMicro = parseDslVersion("tosca_dsl_1_1_1");
    expect(compareVersions(zeroMicro, DSL_VERSION_1_1)).toBe(0);
    expect(compareVersions(oneMicro, DSL_VERSION_1_1)).toBeGreaterThan(0);
  });
});
