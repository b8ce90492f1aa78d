#!/usr/bin/env node
// blueprint-check CLI
// Usage: blueprint-check [blueprint.yaml] [--inputs inputs.yaml]
//                        [--input key=value] [--prepare]

import { existsSync, realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import yaml from "js-yaml";
import { prepareDeploymentPlan } from "./blueprint.js";
import { DslParsingError, FunctionEvaluationError } from "./errors.js";
import { loadDocument, parseBlueprintFile, toRawValue } from "./loader.js";
import type { RawMap } from "./model.js";

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const processOutput: CliOutput = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

const USAGE = `Usage: blueprint-check [path/to/blueprint.yaml] [options]

Options:
  --inputs <file>          YAML mapping of deployment input values
  --input <key=value>      One input value, parsed as a YAML scalar (repeatable)
  --resource-base <dir>    Directory for script mappings
                           (default: the blueprint's directory)
  --no-strict              Accept keys the schema does not declare
  --validate-version       Reject elements newer than tosca_definitions_version
  --prepare                Resolve inputs and print the prepared plan as JSON
  --help, -h               Show this help

Examples:
  blueprint-check                                  # check ./blueprint.yaml
  blueprint-check app.yaml --input port=8080 --prepare
`;

/** One line per failure: `error <code>: <message> (at <element path>)`. */
export function formatError(err: unknown): string {
  if (err instanceof DslParsingError) {
    const at = err.elementPath ? ` (at ${err.elementPath})` : "";
    return `error ${err.code}: ${err.message}${at}`;
  }
  if (err instanceof FunctionEvaluationError) {
    const at = err.path ? ` (at ${err.path})` : "";
    return `error ${err.functionName}: ${err.message}${at}`;
  }
  return `error: ${err instanceof Error ? err.message : String(err)}`;
}

function collectInputs(
  inputsFile: string | undefined,
  pairs: readonly string[]
): RawMap {
  const inputs: RawMap = inputsFile ? loadDocument(inputsFile) : {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new Error(`--input expects key=value but got '${pair}'`);
    }
    const text = pair.slice(separator + 1);
    const loaded = yaml.load(text, { schema: yaml.CORE_SCHEMA });
    inputs[pair.slice(0, separator)] = toRawValue(loaded ?? null);
  }
  return inputs;
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      inputs: { type: "string" },
      input: { type: "string", multiple: true, default: [] },
      "resource-base": { type: "string" },
      "no-strict": { type: "boolean", default: false },
      "validate-version": { type: "boolean", default: false },
      prepare: { type: "boolean", default: false },
      help: { type: "boolean", default: false, short: "h" },
    },
    allowPositionals: true,
  });
}

/** Runs the CLI and returns its exit code. */
export function run(
  argv: readonly string[],
  output: CliOutput = processOutput
): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    output.err(`${formatError(err)}\n${USAGE}`);
    return 1;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    output.err(USAGE);
    return 0;
  }

  const blueprintPath = positionals[0] ?? "blueprint.yaml";
  if (!existsSync(blueprintPath)) {
    output.err(`[blueprint] blueprint not found: ${blueprintPath}\n`);
    return 1;
  }

  try {
    const plan = parseBlueprintFile(blueprintPath, {
      resourceBase: values["resource-base"],
      strict: !values["no-strict"],
      validateVersion: values["validate-version"],
    });
    const count = plan.node_templates.length;
    output.err(
      `[blueprint] ${blueprintPath}: valid (${count} node templates)\n`
    );
    if (values.prepare) {
      const inputs = collectInputs(values.inputs, values.input ?? []);
      const prepared = prepareDeploymentPlan(plan, inputs);
      output.out(`${JSON.stringify(prepared, null, 2)}\n`);
    }
    return 0;
  } catch (err) {
    output.err(`${formatError(err)}\n`);
    return 1;
  }
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (script === undefined || !existsSync(script)) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (invokedDirectly()) {
  process.exit(run(process.argv.slice(2)));
}
