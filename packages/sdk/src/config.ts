import { ConfigError } from "@flow-tx/helpers";
import { z } from "zod";

import {
  DEFAULT_GAS_LIMIT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_POLL_DELAY_STEP_MS,
  DEFAULT_POLL_INITIAL_DELAY_MS,
  DEFAULT_POLL_MAX_ATTEMPTS,
  DEFAULT_POLL_MAX_DELAY_MS,
} from "./defaults";

const MAX_UINT64 = 0xffff_ffff_ffff_ffffn;

const gasLimitSchema = z
  .union([z.bigint(), z.number().int()])
  .transform((value) => BigInt(value))
  .refine((value) => value >= 0n && value <= MAX_UINT64, {
    message: "gasLimit must fit within uint64 range",
  });

export const pollingConfigSchema = z.object({
  initialDelayMs: z.number().int().nonnegative().default(DEFAULT_POLL_INITIAL_DELAY_MS),
  delayStepMs: z.number().int().nonnegative().default(DEFAULT_POLL_DELAY_STEP_MS),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_POLL_MAX_DELAY_MS),
  maxAttempts: z.number().int().positive().default(DEFAULT_POLL_MAX_ATTEMPTS),
});

export const sdkConfigSchema = z.object({
  /** Gas limit used when a build call does not give one */
  gasLimit: gasLimitSchema.default(DEFAULT_GAS_LIMIT),
  polling: pollingConfigSchema.default({}),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default(DEFAULT_LOG_LEVEL),
});

export type SdkConfig = z.output<typeof sdkConfigSchema>;
export type SdkConfigInput = z.input<typeof sdkConfigSchema>;

export function resolveSdkConfig(input: SdkConfigInput = {}): SdkConfig {
  const parsed = sdkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid SDK configuration: ${summary}`, {
      details: { issues: parsed.error.issues },
    });
  }
  return parsed.data;
}
