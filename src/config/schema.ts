import { prettifyError, z } from "zod";
import { ConfigError } from "@/errors";

const MIME_PATTERN = /^(\*|\*\/\*|[\w.+-]+\/(\*|[\w.+-]+))$/;
const EXTENSION_PATTERN = /^\.[^./\\]+$/;

const positiveInt = z.number().int().positive();

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

function hasMethods(value: unknown, methods: string[]): boolean {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return methods.every(
    (method) => method in value && isFunction(Reflect.get(value, method))
  );
}

export const limitsSchema = z.strictObject({
  maxFileSize: positiveInt.optional(),
  maxFieldSize: positiveInt.optional(),
  maxFiles: positiveInt.optional(),
  maxFields: positiveInt.optional(),
  maxBodySize: positiveInt.optional(),
  maxHeaderSize: positiveInt.optional(),
  maxFieldNameSize: positiveInt.optional(),
});

const mimeListSchema = z.array(
  z.string().regex(MIME_PATTERN, "expected a MIME type, 'type/*' or '*/*'")
);

const ruleOptions = {
  allowedMimeTypes: mimeListSchema.optional(),
  maxFileSize: positiveInt.optional(),
};

export const fieldRuleSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("single"),
    name: z.string(),
    required: z.boolean().optional(),
    ...ruleOptions,
  }),
  z.object({
    kind: z.literal("array"),
    name: z.string(),
    maxCount: z.number().int(),
    minCount: z.number().int().optional(),
    ...ruleOptions,
  }),
  z.object({
    kind: z.literal("fields"),
    fields: z.array(
      z.object({
        name: z.string(),
        maxCount: z.number().int().optional(),
        minCount: z.number().int().optional(),
      })
    ),
    ...ruleOptions,
  }),
  z.object({ kind: z.literal("none") }),
  z.object({
    kind: z.literal("any"),
    exclude: z.array(z.string()).optional(),
    ...ruleOptions,
  }),
]);

export const formGateConfigSchema = z.object({
  storage: z.custom((value) => hasMethods(value, ["commit", "cleanup", "read"]), {
    message: "storage must implement commit, cleanup and read",
  }),
  rules: z.array(fieldRuleSchema).optional(),
  limits: limitsSchema.optional(),
  allowedMimeTypes: mimeListSchema.optional(),
  allowedExtensions: z
    .array(z.string().regex(EXTENSION_PATTERN, "expected an extension like '.png'"))
    .optional(),
  unknownFieldPolicy: z.enum(["reject", "ignore"]).optional(),
  mixedKeys: z.enum(["allow", "reject"]).optional(),
  fileFilter: z
    .custom((value) => isFunction(value), { message: "fileFilter must be a function" })
    .optional(),
  logger: z
    .custom((value) => hasMethods(value, ["info", "warn", "error"]), {
      message: "logger must implement info, warn and error",
    })
    .optional(),
  diagnostics: z.boolean().optional(),
});

/**
 * Validates a configuration object.
 * @throws {ConfigError} INVALID_CONFIG with a readable summary of every issue
 */
export function validateConfig(config: unknown): void {
  const parsed = formGateConfigSchema.safeParse(config);
  if (parsed.success) {
    return;
  }

  const details = prettifyError(parsed.error);
  throw new ConfigError("INVALID_CONFIG", `invalid formgate config:\n${details}`, {
    data: { details },
    cause: parsed.error,
  });
}
