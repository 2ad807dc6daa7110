import { z } from "zod";
import { DEFAULT_ENGINE_SETTINGS } from "../../core/src/index";

const trimToOptionalString = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const trimToString = (value: unknown): string => {
  if (typeof value !== "string") {
    return "";
  }

  return value.trim();
};

export const operationKindSchema = z.enum(["list", "copy", "move", "delete", "rename", "mkdir"]);
export const overwritePolicySchema = z.enum(["skip", "overwrite", "rename-with-suffix", "prompt"]);
export const proxyTypeSchema = z.enum(["socks4", "socks5"]);

export const providerPathSchema = z.object({
  handleId: z.string().min(1),
  path: z.string().min(1)
});

export const operationOptionsSchema = z.object({
  overwritePolicy: overwritePolicySchema.default("skip"),
  recursive: z.boolean().default(false),
  preserveTimestamps: z.boolean().default(false),
  abortOnFirstError: z.boolean().default(false)
});

const DESTINATION_KINDS = new Set(["copy", "move", "rename"]);

export const operationRequestSchema = z.object({
  kind: operationKindSchema,
  sources: z.array(providerPathSchema).min(1),
  destination: providerPathSchema.optional(),
  options: operationOptionsSchema.default({})
}).superRefine((value, ctx) => {
  const needsDestination = DESTINATION_KINDS.has(value.kind);

  if (needsDestination && !value.destination) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `destination is required for ${value.kind}`,
      path: ["destination"]
    });
  }

  if (!needsDestination && value.destination) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `destination is not accepted for ${value.kind}`,
      path: ["destination"]
    });
  }

  if (value.kind === "rename") {
    if (value.sources.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rename takes exactly one source",
        path: ["sources"]
      });
    }

    const [source] = value.sources;
    if (source && value.destination && source.handleId !== value.destination.handleId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rename cannot cross providers; use move",
        path: ["destination", "handleId"]
      });
    }
  }
});

export const proxySchema = z.object({
  type: proxyTypeSchema,
  host: z.string().trim().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  username: z.preprocess(trimToOptionalString, z.string().min(1).optional()),
  password: z.preprocess(trimToOptionalString, z.string().min(1).optional())
});

export const remoteConnectionSchema = z.object({
  host: z.string().trim().min(1).max(253),
  port: z.coerce.number().int().min(1).max(65535).default(22),
  username: z.preprocess(trimToString, z.string().min(1)),
  credentialRef: z.string().min(1),
  initialPath: z.preprocess(trimToOptionalString, z.string().min(1).default("/")),
  maxConcurrency: z.coerce.number().int().min(1).max(64).optional(),
  proxy: proxySchema.optional()
});

export const retrySettingsSchema = z.object({
  attempts: z.number().int().min(1).max(10).default(DEFAULT_ENGINE_SETTINGS.retry.attempts),
  baseDelayMs: z.number().int().min(0).default(DEFAULT_ENGINE_SETTINGS.retry.baseDelayMs),
  factor: z.number().min(1).default(DEFAULT_ENGINE_SETTINGS.retry.factor),
  maxDelayMs: z.number().int().min(0).default(DEFAULT_ENGINE_SETTINGS.retry.maxDelayMs)
});

export const engineSettingsSchema = z.object({
  chunkSizeBytes: z.number().int().min(1024).max(16 * 1024 * 1024).default(DEFAULT_ENGINE_SETTINGS.chunkSizeBytes),
  workerCount: z.number().int().min(1).max(64).default(DEFAULT_ENGINE_SETTINGS.workerCount),
  remoteMaxConcurrency: z.number().int().min(1).max(64).default(DEFAULT_ENGINE_SETTINGS.remoteMaxConcurrency),
  retry: retrySettingsSchema.default(DEFAULT_ENGINE_SETTINGS.retry),
  connectTimeoutMs: z.number().int().min(1).default(DEFAULT_ENGINE_SETTINGS.connectTimeoutMs),
  heartbeatIntervalMs: z.number().int().min(1).default(DEFAULT_ENGINE_SETTINGS.heartbeatIntervalMs),
  heartbeatTimeoutMs: z.number().int().min(1).default(DEFAULT_ENGINE_SETTINGS.heartbeatTimeoutMs),
  retainedResults: z.number().int().min(1).default(DEFAULT_ENGINE_SETTINGS.retainedResults)
});

export const conflictDecisionSchema = z.object({
  action: z.enum(["skip", "overwrite", "rename", "decline"]),
  applyToAll: z.boolean().default(false)
});

export const paneLocationSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("local"),
    path: z.string().min(1)
  }),
  z.object({
    kind: z.literal("remote"),
    connection: remoteConnectionSchema,
    path: z.string().min(1).optional()
  })
]);

/** Last-used locations, owned by an external settings store and read once at startup. */
export const sessionRestoreSchema = z.object({
  version: z.literal(1).default(1),
  panes: z.array(
    z.object({
      side: z.enum(["left", "right"]),
      location: paneLocationSchema
    })
  ).max(2).default([])
});

export type OperationRequestInput = z.input<typeof operationRequestSchema>;
export type ValidatedOperationRequest = z.infer<typeof operationRequestSchema>;
export type RemoteConnectionInput = z.input<typeof remoteConnectionSchema>;
export type RemoteConnectionConfig = z.infer<typeof remoteConnectionSchema>;
export type EngineSettingsInput = z.input<typeof engineSettingsSchema>;
export type ConflictDecisionInput = z.input<typeof conflictDecisionSchema>;
export type ConflictDecision = z.infer<typeof conflictDecisionSchema>;
export type PaneLocation = z.infer<typeof paneLocationSchema>;
export type SessionRestoreInput = z.input<typeof sessionRestoreSchema>;
export type SessionRestoreSnapshot = z.infer<typeof sessionRestoreSchema>;
