/**
 * Recursive descent parser for macrochain source text.
 *
 * The grammar is deliberately shallow: only invocations are recognised.
 * Arguments stay token sequences, so `Add(Add(1,2),3)` hands the tokens
 * `Add ( 1 , 2 )` to the outer Add instead of evaluating the inner call
 * first.
 */

import { Result } from "#result";
import type { Token } from "#tokens";

import type {
  ChainExpression,
  Invocation,
  Program,
  Segment,
  SourceLocation,
} from "./ast";
import { Error as ParseError } from "./errors";
import { isIdentifier, lex, type Lexeme } from "./lexer";

export const CHAIN = "Chain";

/**
 * Cursor over the lexeme stream
 */
class LexemeBuffer {
  private idx = 0;

  constructor(
    private readonly lexemes: readonly Lexeme[],
    private readonly end: SourceLocation,
  ) {}

  peek(ahead = 0): Lexeme | undefined {
    return this.lexemes[this.idx + ahead];
  }

  consume(): Lexeme {
    const lexeme = this.lexemes[this.idx];
    if (!lexeme) {
      throw new ParseError("Unexpected end of input", this.end);
    }
    this.idx++;
    return lexeme;
  }

  remaining(): boolean {
    return this.idx < this.lexemes.length;
  }

  /**
   * Whether an invocation (identifier followed by `(`) starts here
   */
  atInvocation(): boolean {
    const name = this.peek();
    return (
      name !== undefined && isIdentifier(name.text) && this.peek(1)?.text === "("
    );
  }

  matchCh(ch: string): Lexeme {
    const next = this.peek();
    if (next?.text !== ch) {
      throw new ParseError(
        `expected ${ch} but found ${next?.text ?? "end of input"}`,
        next?.loc ?? this.end,
        [ch],
      );
    }
    return this.consume();
  }
}

const span = (from: SourceLocation, to: SourceLocation): SourceLocation => ({
  ...from,
  length: to.offset + to.length - from.offset,
});

function parseInvocation(buffer: LexemeBuffer): Invocation {
  const name = buffer.consume();
  buffer.matchCh("(");

  const args: Token[][] = [];
  let current: Token[] = [];
  let sawComma = false;
  let depth = 0;

  for (;;) {
    const next = buffer.peek();
    if (!next) {
      throw new ParseError(
        `Unterminated argument list for ${name.text}`,
        name.loc,
        [")"],
      );
    }
    buffer.consume();

    if (next.text === ")" && depth === 0) {
      if (current.length > 0 || sawComma) {
        args.push(current);
      }
      return {
        kind: "invocation",
        name: name.text,
        args,
        loc: span(name.loc, next.loc),
      };
    }

    if (next.text === "," && depth === 0) {
      args.push(current);
      current = [];
      sawComma = true;
      continue;
    }

    if (next.text === "(") depth++;
    if (next.text === ")") depth--;
    current.push(next.text);
  }
}

function parseChain(buffer: LexemeBuffer): ChainExpression {
  const name = buffer.consume();
  buffer.matchCh("(");

  const links: Invocation[] = [];
  for (;;) {
    const next = buffer.peek();
    if (!next) {
      throw new ParseError("Unterminated Chain", name.loc, [")"]);
    }
    if (next.text === ")") {
      buffer.consume();
      return { kind: "chain", links, loc: span(name.loc, next.loc) };
    }
    if (next.text === ",") {
      buffer.consume();
      continue;
    }
    if (!buffer.atInvocation()) {
      throw new ParseError(
        `expected an operation invocation inside Chain but found ${next.text}`,
        next.loc,
        ["invocation"],
      );
    }
    links.push(parseInvocation(buffer));
  }
}

function parseProgram(buffer: LexemeBuffer): Program {
  const segments: Segment[] = [];

  while (buffer.remaining()) {
    const next = buffer.peek();
    if (!next) break;

    if (buffer.atInvocation()) {
      const node =
        next.text === CHAIN ? parseChain(buffer) : parseInvocation(buffer);
      segments.push({ node, spaced: next.spaced });
      continue;
    }

    buffer.consume();
    segments.push({
      node: { kind: "text", token: next.text, loc: next.loc },
      spaced: next.spaced,
    });
  }

  return { kind: "program", segments };
}

const endOf = (source: string): SourceLocation => {
  const lines = source.split("\n");
  return {
    offset: source.length,
    length: 0,
    line: lines.length,
    column: (lines.at(-1)?.length ?? 0) + 1,
  };
};

/**
 * Parse source text into a program
 */
export function parse(source: string): Result<Program, ParseError> {
  const lexed = lex(source);
  if (!lexed.success) {
    return lexed;
  }

  try {
    return Result.ok(parseProgram(new LexemeBuffer(lexed.value, endOf(source))));
  } catch (error) {
    if (error instanceof ParseError) {
      return Result.err(error);
    }
    throw error;
  }
}

/**
 * Parse a single invocation, e.g. `Add(5, 6)`
 */
export function parseInvocationText(
  source: string,
): Result<Invocation, ParseError> {
  const parsed = parse(source);
  if (!parsed.success) {
    return parsed;
  }
  const [first, ...rest] = parsed.value.segments;
  if (!first || rest.length > 0 || first.node.kind !== "invocation") {
    return Result.err(
      new ParseError(
        "expected exactly one operation invocation",
        first?.node.loc ?? endOf(source),
        ["invocation"],
      ),
    );
  }
  return Result.ok(first.node);
}
