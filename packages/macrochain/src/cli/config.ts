import { promises as fs } from "fs";
import path from "path";

import {
  ConfigError,
  ErrorCode,
  parseConfig,
  type EngineOptions,
} from "#config";
import { Result } from "#result";

export const DEFAULT_CONFIG_FILE = "macrochain.yaml";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Load options from an explicit config file, or from macrochain.yaml in
 * the working directory when it exists
 */
export async function loadConfig(
  configPath?: string,
): Promise<Result<Partial<EngineOptions>, ConfigError>> {
  const file = configPath ?? path.resolve(DEFAULT_CONFIG_FILE);

  let text: string;
  try {
    text = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (configPath === undefined && isMissingFile(error)) {
      return Result.ok({});
    }
    const reason = error instanceof Error ? error.message : String(error);
    return Result.err(new ConfigError(ErrorCode.UNREADABLE, reason));
  }

  return parseConfig(text);
}
