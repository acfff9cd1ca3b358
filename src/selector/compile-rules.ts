import { ConfigError } from "@/errors";
import type {
  CompiledRule,
  CompiledRules,
  FieldRule,
  UnknownFieldPolicy,
} from "./types";

const ANY_RULE: CompiledRule = Object.freeze({
  kind: "any",
  name: "*",
  maxCount: undefined,
  minCount: 0,
  allowedMimeTypes: undefined,
  maxFileSize: undefined,
});

function invalid(message: string, data?: Record<string, unknown>): never {
  throw new ConfigError("INVALID_RULES", message, { data });
}

function freezeList(list: string[] | undefined): readonly string[] | undefined {
  return list ? Object.freeze([...list]) : undefined;
}

function checkCounts(name: string, minCount: number, maxCount?: number): void {
  if (maxCount !== undefined && maxCount < 1) {
    invalid(`rule for '${name}' must allow at least one file`, {
      field: name,
      maxCount,
    });
  }
  if (minCount < 0) {
    invalid(`rule for '${name}' has a negative minCount`, { field: name });
  }
  if (maxCount !== undefined && minCount > maxCount) {
    invalid(`rule for '${name}' has minCount greater than maxCount`, {
      field: name,
      minCount,
      maxCount,
    });
  }
}

/** Expands one configured rule into its name-bound compiled rules */
function expandRule(
  rule: Exclude<FieldRule, { kind: "none" | "any" }>
): CompiledRule[] {
  const shared = {
    allowedMimeTypes: freezeList(rule.allowedMimeTypes),
    maxFileSize: rule.maxFileSize,
  };

  switch (rule.kind) {
    case "single":
      return [
        {
          kind: rule.kind,
          name: rule.name,
          maxCount: 1,
          minCount: rule.required ? 1 : 0,
          ...shared,
        },
      ];
    case "array":
      checkCounts(rule.name, rule.minCount ?? 0, rule.maxCount);
      return [
        {
          kind: rule.kind,
          name: rule.name,
          maxCount: rule.maxCount,
          minCount: rule.minCount ?? 0,
          ...shared,
        },
      ];
    case "fields":
      if (rule.fields.length === 0) {
        invalid("'fields' rule must list at least one field");
      }
      return rule.fields.map((field) => {
        checkCounts(field.name, field.minCount ?? 0, field.maxCount);
        return {
          kind: rule.kind,
          name: field.name,
          maxCount: field.maxCount,
          minCount: field.minCount ?? 0,
          ...shared,
        };
      });
    default:
      return [];
  }
}

/**
 * Validates the configured field rules and builds the lookup the selector uses.
 * Fails fast on duplicate names, conflicting wildcard rules and bad counts.
 * An empty rule list behaves as a single `any` rule.
 */
export function compileRules(
  rules: readonly FieldRule[],
  unknownFieldPolicy: UnknownFieldPolicy = "reject"
): CompiledRules {
  const byName = new Map<string, CompiledRule>();
  let anyRule: CompiledRule | null = null;
  let excluded = new Set<string>();
  let hasNone = false;

  for (const rule of rules) {
    if (rule.kind === "none") {
      hasNone = true;
      continue;
    }

    if (rule.kind === "any") {
      if (anyRule) {
        invalid("only one 'any' rule may be configured");
      }
      anyRule = Object.freeze({
        ...ANY_RULE,
        allowedMimeTypes: freezeList(rule.allowedMimeTypes),
        maxFileSize: rule.maxFileSize,
      });
      excluded = new Set(rule.exclude ?? []);
      continue;
    }

    for (const compiled of expandRule(rule)) {
      if (compiled.name.length === 0) {
        invalid("field rule names cannot be empty");
      }
      if (byName.has(compiled.name)) {
        invalid(`field '${compiled.name}' is matched by more than one rule`, {
          field: compiled.name,
        });
      }
      byName.set(compiled.name, Object.freeze(compiled));
    }
  }

  if (hasNone && (anyRule || byName.size > 0)) {
    invalid("'none' rule cannot be combined with rules that accept files");
  }

  if (rules.length === 0) {
    anyRule = ANY_RULE;
  }

  return Object.freeze({
    byName,
    any: anyRule,
    excluded,
    unknownFieldPolicy,
  });
}
