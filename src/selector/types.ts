import type { LimitError } from "@/errors";
import type { Result } from "@/utils";

/** Per-rule overrides applied to files accepted by that rule */
export interface RuleOptions {
  /** MIME allowlist for this rule; replaces the global allowlist */
  allowedMimeTypes?: string[];
  /** Size limit for this rule's files; replaces limits.maxFileSize */
  maxFileSize?: number;
}

export interface SelectedField {
  name: string;
  /** Omitted: no per-field cap (limits.maxFiles still applies) */
  maxCount?: number;
  minCount?: number;
}

export type FieldRule =
  | ({ kind: "single"; name: string; required?: boolean } & RuleOptions)
  | ({
      kind: "array";
      name: string;
      maxCount: number;
      minCount?: number;
    } & RuleOptions)
  | ({ kind: "fields"; fields: SelectedField[] } & RuleOptions)
  | { kind: "none" }
  | ({ kind: "any"; exclude?: string[] } & RuleOptions);

export type RuleKind = FieldRule["kind"];

/** What to do with file fields no rule accepts */
export type UnknownFieldPolicy = "reject" | "ignore";

/** A single name-bound (or wildcard) rule after validation */
export interface CompiledRule {
  readonly kind: RuleKind;
  /** Field name, or "*" for the any rule */
  readonly name: string;
  readonly maxCount: number | undefined;
  readonly minCount: number;
  readonly allowedMimeTypes: readonly string[] | undefined;
  readonly maxFileSize: number | undefined;
}

export interface CompiledRules {
  readonly byName: ReadonlyMap<string, CompiledRule>;
  readonly any: CompiledRule | null;
  readonly excluded: ReadonlySet<string>;
  readonly unknownFieldPolicy: UnknownFieldPolicy;
}

export type SelectorDecision =
  | { action: "accept"; rule: CompiledRule | null }
  | { action: "ignore" };

/** Per-session selector state; create one per parse */
export interface SelectorEngine {
  evaluate: (
    fieldName: string,
    isFile: boolean
  ) => Result<SelectorDecision, LimitError>;
  /** Names whose minimum count was not reached, in rule order */
  missingRequired: () => string[];
  /** Accepted file count per field name */
  counts: () => ReadonlyMap<string, number>;
}
