import { OperationRegistry, type ChainError } from "#chain";
import type { Program } from "#parser";
import type { Pass } from "#pipeline";
import { Result } from "#result";

import { linkProgram, type Linked } from "./linker";

/**
 * Linking pass - resolves operation names and links every chain
 */
export const pass: Pass<{
  needs: {
    program: Program;
    registry?: OperationRegistry;
  };
  adds: {
    linked: Linked;
  };
  error: ChainError;
}> = {
  async run({ program, registry = OperationRegistry.standard() }) {
    return Result.map(linkProgram(program, { registry }), (linked) => ({
      linked,
    }));
  },
};
