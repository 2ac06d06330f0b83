import { promises as fs } from "fs";
import { parseArgs } from "util";

import { resolveOptions, type EngineOptions } from "#config";
import type { MacroError } from "#errors";
import { evaluate } from "#pipeline";
import { Result } from "#result";

import { DEFAULT_CONFIG_FILE, loadConfig } from "./config";
import { formatJson, formatText, formatTrace } from "./formatters";
import {
  commonOptions,
  parseFormat,
  parseMaxExponent,
  parseRangeTier,
  usage,
} from "./options";
import {
  displayErrors,
  displayWarnings,
  exitWithError,
  writeOutput,
} from "./output";

const EXPRESSION_PATH = "<expression>";

const parseCommandLine = (args: readonly string[]) =>
  parseArgs({ args: [...args], options: commonOptions, allowPositionals: true });

/**
 * Evaluate a file or expression from the command line; resolves to the
 * process exit status
 */
export async function handleEvaluateCommand(
  args: readonly string[],
): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(args);
  } catch (error) {
    return exitWithError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    console.log(usage);
    return 0;
  }

  const [file, ...extra] = positionals;
  if (extra.length > 0) {
    return exitWithError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  if (values.expression !== undefined && file !== undefined) {
    return exitWithError("Pass either a file or --expression, not both");
  }

  let source: string;
  let sourcePath: string;
  if (values.expression !== undefined) {
    source = values.expression;
    sourcePath = EXPRESSION_PATH;
  } else if (file !== undefined) {
    try {
      source = await fs.readFile(file, "utf-8");
    } catch (error) {
      return exitWithError(
        `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    sourcePath = file;
  } else {
    console.error(usage);
    return exitWithError("No input file or expression");
  }

  const format = parseFormat(values.format ?? "text");
  const flags = readFlags(values);
  const config = await loadConfig(values.config);
  const configContext = { sourcePath: values.config ?? DEFAULT_CONFIG_FILE };
  displayWarnings(Result.warnings(config), configContext);
  if (!config.success || !flags.success || !format.success) {
    displayErrors(Result.errors(config), configContext);
    displayErrors([...Result.errors(flags), ...Result.errors(format)]);
    return 1;
  }

  const options: EngineOptions = resolveOptions(config.value, flags.value);
  const result = await evaluate({ source, sourcePath, ...options });

  const context = { source, sourcePath };
  const warnings: MacroError[] = Result.warnings(result);
  displayWarnings(warnings, context);
  if (!result.success) {
    displayErrors(Result.errors(result), context);
    return 1;
  }

  const output = result.value;
  if (format.value === "json") {
    return emit(formatJson(output, warnings), values.output);
  }

  if (options.trace && output.trace.length > 0) {
    console.error(formatTrace(output.trace));
  }
  return emit(formatText(output), values.output);
}

async function emit(content: string, outputPath?: string): Promise<number> {
  try {
    await writeOutput(content, outputPath);
  } catch (error) {
    return exitWithError(
      `Cannot write ${outputPath ?? "output"}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return 0;
}

function readFlags(values: {
  range?: string;
  "max-exponent"?: string;
  trace?: boolean;
}): Result<Partial<EngineOptions>, MacroError> {
  const flags: Partial<EngineOptions> = {};
  const errors: MacroError[] = [];

  if (values.range !== undefined) {
    const range = parseRangeTier(values.range);
    if (range.success) flags.range = range.value;
    else errors.push(...Result.errors(range));
  }
  if (values["max-exponent"] !== undefined) {
    const maxExponent = parseMaxExponent(values["max-exponent"]);
    if (maxExponent.success) flags.maxExponent = maxExponent.value;
    else errors.push(...Result.errors(maxExponent));
  }
  if (values.trace !== undefined) {
    flags.trace = values.trace;
  }

  return errors.length > 0 ? Result.err(errors) : Result.ok(flags);
}
