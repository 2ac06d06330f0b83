/**
 * Source text front end
 *
 * Exports the lexer, parser and syntax tree types
 */

export * from "./ast";
export { lex, isIdentifier, type Lexeme } from "./lexer";
export { parse, parseInvocationText, CHAIN } from "./parser";
export { Error as ParseError } from "./errors";
