import { Result } from "#result";

import type { SourceLocation } from "./ast";
import { Error as ParseError } from "./errors";

export interface Lexeme {
  text: string;
  loc: SourceLocation;
  /** whether whitespace or a comment preceded this lexeme */
  spaced: boolean;
}

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const DIGITS = /[0-9]+/y;
const WHITESPACE = /\s/;

export const isIdentifier = (text: string): boolean =>
  /^[A-Za-z_][A-Za-z0-9_]*$/.test(text);

/**
 * Splits source text into tokens: identifiers, digit runs, and single
 * punctuation characters. `//` and `/* *\/` comments are dropped.
 */
export function lex(source: string): Result<Lexeme[], ParseError> {
  const lexemes: Lexeme[] = [];
  let offset = 0;
  let line = 1;
  let column = 1;
  let spaced = false;

  const location = (length: number): SourceLocation => ({
    offset,
    length,
    line,
    column,
  });

  const advance = (count: number) => {
    for (let i = 0; i < count; i++) {
      if (source[offset] === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
      offset++;
    }
  };

  const matchAt = (pattern: RegExp): string | undefined => {
    pattern.lastIndex = offset;
    return pattern.exec(source)?.[0];
  };

  while (offset < source.length) {
    const ch = source[offset];

    if (WHITESPACE.test(ch)) {
      spaced = true;
      advance(1);
      continue;
    }

    if (source.startsWith("//", offset)) {
      const end = source.indexOf("\n", offset);
      advance((end === -1 ? source.length : end) - offset);
      spaced = true;
      continue;
    }

    if (source.startsWith("/*", offset)) {
      const end = source.indexOf("*/", offset + 2);
      if (end === -1) {
        return Result.err(
          new ParseError("Unterminated block comment", location(2), ["*/"]),
        );
      }
      advance(end + 2 - offset);
      spaced = true;
      continue;
    }

    const text = matchAt(IDENTIFIER) ?? matchAt(DIGITS) ?? ch;
    lexemes.push({ text, loc: location(text.length), spaced });
    advance(text.length);
    spaced = false;
  }

  return Result.ok(lexemes);
}
