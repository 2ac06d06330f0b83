import type { OperationRegistry } from "#chain";
import type { EngineOptions } from "#config";
import type { MacroError } from "#errors";
import type { Output } from "#evaluator";
import type { Result } from "#result";

import { targetSequences } from "./sequences";

export interface EvaluateOptions extends Partial<EngineOptions> {
  source: string;
  sourcePath?: string;
  registry?: OperationRegistry;
}

/**
 * Parse, link and evaluate source text
 */
export async function evaluate(
  options: EvaluateOptions,
): Promise<Result<Output, MacroError>> {
  const result = await targetSequences.output.run(options);
  if (!result.success) {
    return result;
  }
  return { ...result, value: result.value.output };
}
