export {
  createLimitEnforcer,
  DEFAULT_LIMITS,
  fileExtension,
  matchesMimeType,
  mimeEssence,
  resolveLimits,
} from "./limits";
export type {
  LimitEnforcer,
  LimitTotals,
  ResolvedLimits,
  UploadAllowlist,
  UploadLimits,
} from "./types";
