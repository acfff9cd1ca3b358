import { LimitError } from "@/errors";
import { Err, Ok, type Result } from "@/utils";
import type {
  CompiledRule,
  CompiledRules,
  SelectorDecision,
  SelectorEngine,
} from "./types";

/**
 * Creates the per-session selector over compiled rules.
 * Exact-name rules win over the `any` rule; plain (non-file) fields are
 * always accepted here and counted by the limit enforcer instead.
 */
export function createSelector(rules: CompiledRules): SelectorEngine {
  const counts = new Map<string, number>();

  function record(
    fieldName: string,
    rule: CompiledRule
  ): Result<SelectorDecision, LimitError> {
    const next = (counts.get(fieldName) ?? 0) + 1;
    if (rule.maxCount !== undefined && next > rule.maxCount) {
      return Err(
        new LimitError(
          "TOO_MANY_FILES",
          `too many files for field '${fieldName}'`,
          { data: { field: fieldName, maxCount: rule.maxCount } }
        )
      );
    }
    counts.set(fieldName, next);
    return Ok({ action: "accept", rule });
  }

  function unknown(fieldName: string): Result<SelectorDecision, LimitError> {
    if (rules.unknownFieldPolicy === "ignore") {
      return Ok({ action: "ignore" });
    }
    return Err(
      new LimitError("UNEXPECTED_FIELD", `unexpected file field '${fieldName}'`, {
        data: { field: fieldName },
      })
    );
  }

  return {
    evaluate: (fieldName, isFile) => {
      if (!isFile) {
        return Ok({ action: "accept", rule: null });
      }

      const exact = rules.byName.get(fieldName);
      if (exact) {
        return record(fieldName, exact);
      }

      if (rules.any && !rules.excluded.has(fieldName)) {
        return record(fieldName, rules.any);
      }

      return unknown(fieldName);
    },

    missingRequired: () => {
      const missing: string[] = [];
      for (const rule of rules.byName.values()) {
        if ((counts.get(rule.name) ?? 0) < rule.minCount) {
          missing.push(rule.name);
        }
      }
      return missing;
    },

    counts: () => counts,
  };
}
