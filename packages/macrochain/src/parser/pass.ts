import type { Pass } from "#pipeline";
import { Result } from "#result";

import type { Program } from "./ast";
import type { Error as ParseError } from "./errors";
import { parse } from "./parser";

/**
 * Parsing pass - converts source text to a program
 */
export const pass: Pass<{
  needs: {
    source: string;
    sourcePath?: string;
  };
  adds: {
    program: Program;
  };
  error: ParseError;
}> = {
  async run({ source }) {
    return Result.map(parse(source), (program) => ({ program }));
  },
};
