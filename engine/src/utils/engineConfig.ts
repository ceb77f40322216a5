/** Engine settings taken from the environment. */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { RENDER_DEBOUNCE_MS } from './constants.js';
import { formatIssues } from './stateValidator.js';

export interface EngineConfig {
  positionsPath: string;
  logDir?: string;
  debounceMs: number;
}

export const DEFAULT_POSITIONS_PATH = path.join(os.homedir(), '.flowscribe', 'positions.json');

const EnvSchema = z.object({
  FLOWSCRIBE_POSITIONS: z.string().min(1).optional(),
  FLOWSCRIBE_LOG_DIR: z.string().min(1).optional(),
  FLOWSCRIBE_DEBOUNCE_MS: z.coerce.number().int().min(0).max(60_000).optional(),
});

/** Throws with every offending variable listed when the environment is invalid. */
export function resolveEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse({
    FLOWSCRIBE_POSITIONS: env.FLOWSCRIBE_POSITIONS || undefined,
    FLOWSCRIBE_LOG_DIR: env.FLOWSCRIBE_LOG_DIR || undefined,
    FLOWSCRIBE_DEBOUNCE_MS: env.FLOWSCRIBE_DEBOUNCE_MS || undefined,
  });
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${formatIssues(parsed.error).join('; ')}`);
  }
  const values = parsed.data;
  return {
    positionsPath: path.resolve(values.FLOWSCRIBE_POSITIONS ?? DEFAULT_POSITIONS_PATH),
    ...(values.FLOWSCRIBE_LOG_DIR ? { logDir: path.resolve(values.FLOWSCRIBE_LOG_DIR) } : {}),
    debounceMs: values.FLOWSCRIBE_DEBOUNCE_MS ?? RENDER_DEBOUNCE_MS,
  };
}
