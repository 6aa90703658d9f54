/**
 * Math module barrel export
 * Re-exports the operation dispatcher and the expression evaluator
 */

export * from "./evaluator.ts";
export * from "./operators.ts";
