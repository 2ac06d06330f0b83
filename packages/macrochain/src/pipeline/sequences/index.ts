/**
 * Concrete evaluation sequences
 */

import { pass as optionsPass } from "../../config/pass";
import { pass as evaluationPass } from "../../evaluator/pass";
import { pass as linkingPass } from "../../linker/pass";
import { pass as parsingPass } from "../../parser/pass";
import { compose } from "../sequence";

// Syntax tree only
export const parseSequence = compose(optionsPass, parsingPass);

// Parsing and linking; reports every static error without running anything
export const linkSequence = compose(parseSequence, linkingPass);

export const evaluateSequence = compose(linkSequence, evaluationPass);

export const targetSequences = {
  ast: parseSequence,
  linked: linkSequence,
  output: evaluateSequence,
} as const;

export type Target = keyof typeof targetSequences;
