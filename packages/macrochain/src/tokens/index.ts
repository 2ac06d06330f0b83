/**
 * Tokens, values and placeholder substitution
 */

export * from "./token";
