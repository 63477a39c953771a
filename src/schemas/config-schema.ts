import { z } from "zod";
import { parseBackendAddress, parseDuration } from "../core/utils";

const durationSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const ms = parseDuration(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration "${value}" (use e.g. 500ms, 5s, 1m)`,
      });
      return z.NEVER;
    }
    if (ms <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duration "${value}" must be greater than zero`,
      });
      return z.NEVER;
    }
    return ms;
  });

const backendAddressSchema = z.string().superRefine((address, ctx) => {
  try {
    parseBackendAddress(address);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
  }
});

const serverSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
});

const healthCheckSchema = z.object({
  interval: durationSchema.default("5s"),
  timeout: durationSchema.default("2s"),
  path: z.string().startsWith("/").default("/health"),
});

const metricsSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.coerce.number().int().min(1).max(65535).default(2112),
});

const loggingSchema = z.object({
  database: z.string().min(1).optional(),
});

export const rootConfigSchema = z.object({
  server: serverSchema.default({}),
  backends: z.array(backendAddressSchema).min(1, "At least one backend is required"),
  // Free-form on purpose: unknown names fall back to random selection.
  algorithm: z.string().default("roundrobin"),
  health_check: healthCheckSchema.default({}),
  metrics: metricsSchema.default({}),
  logging: loggingSchema.default({}),
});

export type RootConfig = z.infer<typeof rootConfigSchema>;
export type RawRootConfig = z.input<typeof rootConfigSchema>;
