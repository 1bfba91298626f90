/**
 * Runtime configuration, read once from the environment at startup.
 */
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './utils/logger.js';

const DEFAULT_CONTROLS_FILE = fileURLToPath(new URL('../src/data/controls.yaml', import.meta.url));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8171),
  CONTROLS_FILE: z.string().min(1).default(DEFAULT_CONTROLS_FILE),
  EVENT_SINK: z.enum(['file', 'log', 'none']).default('file'),
  EVENT_LOG_PATH: z.string().min(1).default('./logs/events.jsonl'),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  CLASSIFIER_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
  CLASSIFIER_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.3),
  CLASSIFIER_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface AppConfig {
  port: number;
  controlsFile: string;
  eventSink: 'file' | 'log' | 'none';
  eventLogPath: string;
  classifier: {
    apiKey?: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    controlsFile: e.CONTROLS_FILE,
    eventSink: e.EVENT_SINK,
    eventLogPath: e.EVENT_LOG_PATH,
    classifier: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.CLASSIFIER_MODEL,
      temperature: e.CLASSIFIER_TEMPERATURE,
      maxTokens: e.CLASSIFIER_MAX_TOKENS,
    },
    logLevel: e.LOG_LEVEL,
  };
}
