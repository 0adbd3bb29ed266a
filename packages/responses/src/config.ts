import { z } from 'zod';
import { ConfigurationError, formatIssues, presentEnv } from '@switchboard/llm';
import type { Environment } from '@switchboard/llm';

export const DEFAULT_RETENTION_MS = 15 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;
export const DEFAULT_WAIT_TIMEOUT_MS = 30 * 1000;

const ManagerEnvSchema = z.object({
  SWITCHBOARD_RESPONSE_RETENTION_MS: z.coerce.number().int().positive().optional(),
  SWITCHBOARD_RESPONSE_SWEEP_MS: z.coerce.number().int().positive().optional(),
  SWITCHBOARD_RESPONSE_WAIT_MS: z.coerce.number().int().positive().optional(),
});

export type ManagerEnvSettings = {
  readonly retentionMs?: number;
  readonly sweepIntervalMs?: number;
  readonly waitTimeoutMs?: number;
};

export function loadManagerOptions(env: Environment = process.env): ManagerEnvSettings {
  const parsed = ManagerEnvSchema.safeParse(presentEnv(env));
  if (!parsed.success) {
    throw new ConfigurationError(`invalid response manager configuration: ${formatIssues(parsed.error)}`);
  }
  return {
    retentionMs: parsed.data.SWITCHBOARD_RESPONSE_RETENTION_MS,
    sweepIntervalMs: parsed.data.SWITCHBOARD_RESPONSE_SWEEP_MS,
    waitTimeoutMs: parsed.data.SWITCHBOARD_RESPONSE_WAIT_MS,
  };
}
