/**
 * Token-level representation of values, templates and placeholders.
 *
 * A value is stored bare; the enclosing delimiter pair is added only when
 * a value is rendered as a stack entry or substituted by Print.
 */

export type Token = string;

/**
 * Bare contents of one computed or literal result
 */
export type Value = readonly Token[];

/**
 * Token sequence that may contain placeholders
 */
export type Template = readonly Token[];

export const PLACEHOLDER = "$";
export const OPEN = "(";
export const CLOSE = ")";

const WORD_START = /^[A-Za-z0-9_]/;
const WORD_END = /[A-Za-z0-9_]$/;

export const isPlaceholder = (token: Token): boolean => token === PLACEHOLDER;

export const enclose = (value: Value): Token[] => [OPEN, ...value, CLOSE];

export const countPlaceholders = (templates: readonly Template[]): number =>
  templates.reduce(
    (count, template) => count + template.filter(isPlaceholder).length,
    0,
  );

/**
 * Fills placeholders left to right across all templates, one value each.
 * Placeholders beyond the supplied values stay in place.
 */
export const fillEach = (
  templates: readonly Template[],
  values: readonly (readonly Token[])[],
): Template[] => {
  let next = 0;
  return templates.map((template) =>
    template.flatMap((token) =>
      isPlaceholder(token) && next < values.length ? values[next++] : [token],
    ),
  );
};

/**
 * Substitutes the same tokens for every placeholder occurrence
 */
export const fillAll = (
  template: Template,
  replacement: readonly Token[],
): Token[] =>
  template.flatMap((token) => (isPlaceholder(token) ? replacement : [token]));

/**
 * Renders tokens as text; a space separates two adjacent word tokens so
 * that rendering and re-lexing agree
 */
export const render = (tokens: readonly Token[]): string => {
  let text = "";
  let previous: Token | undefined;
  for (const token of tokens) {
    if (previous && WORD_END.test(previous) && WORD_START.test(token)) {
      text += " ";
    }
    text += token;
    previous = token;
  }
  return text;
};

/**
 * Joins tokens into a single token with nothing in between
 */
export const paste = (tokens: readonly Token[]): Token => tokens.join("");

export const renderValue = (value: Value): string => render(enclose(value));
