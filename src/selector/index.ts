export { compileRules } from "./compile-rules";
export { createSelector } from "./selector";
export type {
  CompiledRule,
  CompiledRules,
  FieldRule,
  RuleKind,
  RuleOptions,
  SelectedField,
  SelectorDecision,
  SelectorEngine,
  UnknownFieldPolicy,
} from "./types";
