export { add, subtract, negate, log2, pow2 } from "./arithmetic";
export { push, pop, identity, popArity, POP_ARITIES, type PopArity } from "./stack";
export { unwrap, print, tokenize, joinTemplate } from "./terminals";
