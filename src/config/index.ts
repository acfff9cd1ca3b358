export {
  fieldRuleSchema,
  formGateConfigSchema,
  limitsSchema,
  validateConfig,
} from "./schema";
