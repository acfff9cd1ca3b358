import type { FormGateError } from "@/errors";
import type { Result } from "@/utils";

export function unwrap<T>(result: Result<T, FormGateError>): T {
  if (result.isErr) {
    throw result.error;
  }
  return result.value;
}

export function unwrapErr<T>(result: Result<T, FormGateError>): FormGateError {
  if (result.isOk) {
    throw new Error("expected parse to fail");
  }
  return result.error;
}
