export {
  evaluateItems,
  joinItems,
  type ChainTraceEntry,
  type EvaluatedItem,
  type Output,
} from "./evaluator";
