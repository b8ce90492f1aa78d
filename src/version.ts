// tosca_definitions_version parsing and the supported DSL versions

import {
  DslLogicError,
  ERROR_CODE_INVALID_VERSION,
  ERROR_CODE_MISSING_VERSION,
  ERROR_CODE_UNSUPPORTED_VERSION,
} from "./errors.js";
import type { DslVersion, RawValue } from "./model.js";

export const VERSION_KEY = "tosca_definitions_version";
export const DSL_VERSION_PREFIX = "tosca_dsl_";

const FORMAT = `${DSL_VERSION_PREFIX}<major>_<minor>[_<micro>]`;

function versionOf(
  raw: string,
  major: number,
  minor: number,
  micro = 0
): DslVersion {
  return { raw, major, minor, micro };
}

export const DSL_VERSION_1_0 = versionOf(`${DSL_VERSION_PREFIX}1_0`, 1, 0);
export const DSL_VERSION_1_1 = versionOf(`${DSL_VERSION_PREFIX}1_1`, 1, 1);
export const DSL_VERSION_1_2 = versionOf(`${DSL_VERSION_PREFIX}1_2`, 1, 2);

export const SUPPORTED_VERSIONS: readonly DslVersion[] = [
  DSL_VERSION_1_0,
  DSL_VERSION_1_1,
  DSL_VERSION_1_2,
];

/** Parses a version string without checking that it is supported. */
export function parseDslVersion(value: RawValue | undefined): DslVersion {
  if (value === undefined || value === null || value === "") {
    throw new DslLogicError(
      ERROR_CODE_MISSING_VERSION,
      `${VERSION_KEY} is missing or empty`
    );
  }
  if (typeof value !== "string") {
    throw new DslLogicError(
      ERROR_CODE_INVALID_VERSION,
      `Invalid ${VERSION_KEY}: ${JSON.stringify(value)} is not a string`
    );
  }
  const parts = value.startsWith(DSL_VERSION_PREFIX)
    ? value.slice(DSL_VERSION_PREFIX.length).split("_")
    : [];
  if (parts.length < 2 || parts.length > 3) {
    throw new DslLogicError(
      ERROR_CODE_INVALID_VERSION,
      `Invalid ${VERSION_KEY}: '${value}', ` +
        `expected a value following this format: '${FORMAT}'`
    );
  }

  const labels = ["major", "minor", "micro"];
  const numbers = parts.map((part, i) => {
    if (!/^\d+$/.test(part)) {
      throw new DslLogicError(
        ERROR_CODE_INVALID_VERSION,
        `Invalid ${VERSION_KEY}: '${value}', ` +
          `${labels[i]} version is '${part}' ` +
          `while expected to be a number`
      );
    }
    return Number(part);
  });
  return versionOf(value, numbers[0], numbers[1], numbers[2]);
}

/** Parses a version string and checks it against SUPPORTED_VERSIONS. */
export function parseSupportedDslVersion(
  value: RawValue | undefined
): DslVersion {
  const version = parseDslVersion(value);
  const supported = SUPPORTED_VERSIONS.find(
    (v) =>
      v.major === version.major &&
      v.minor === version.minor &&
      v.micro === version.micro
  );
  if (!supported) {
    throw new DslLogicError(
      ERROR_CODE_UNSUPPORTED_VERSION,
      `Unexpected ${VERSION_KEY} '${value}'. ` +
        "Currently supported versions are: " +
        SUPPORTED_VERSIONS.map((v) => v.raw).join(", ")
    );
  }
  return version;
}
