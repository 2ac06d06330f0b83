import type { OperationRegistry } from "#chain";
import type { Pass } from "#pipeline";
import { Result } from "#result";

import type { Error as ConfigError } from "./errors";
import { checkOptions, resolveOptions, type EngineOptions } from "./options";

/**
 * Options pass - settles engine options before anything is evaluated
 */
export const pass: Pass<{
  needs: {
    source: string;
    sourcePath?: string;
    registry?: OperationRegistry;
  } & Partial<EngineOptions>;
  adds: {
    options: EngineOptions;
  };
  error: ConfigError;
}> = {
  async run({ range, maxExponent, trace }) {
    return Result.map(
      checkOptions(resolveOptions({ range, maxExponent, trace })),
      (options) => ({ options }),
    );
  },
};
