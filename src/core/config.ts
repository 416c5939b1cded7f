/**
 * Runtime configuration.
 *
 * Built once at process start from the environment and passed explicitly
 * into the orchestrator, adapters and server. Nothing else reads process.env.
 */

import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  ASSEMBLYAI_API_KEY: z.string().trim().min(1, 'ASSEMBLYAI_API_KEY is required'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  ACCENT_DATA_DIR: z.string().trim().min(1).default('./data'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  ACCENT_TABLE_PATH: z.string().trim().min(1).optional(),
  FFMPEG_PATH: z.string().trim().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().trim().min(1).default('ffprobe'),
  YT_DLP_PATH: z.string().trim().min(1).default('yt-dlp'),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
});

export interface ToolPaths {
  readonly ffmpeg: string;
  readonly ffprobe: string;
  readonly ytDlp: string;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly assemblyAiApiKey: string;
  readonly port: number;
  readonly dataDir: string;
  readonly logLevel: LogLevel;
  readonly accentTablePath?: string;
  readonly tools: ToolPaths;
}

/** Treats empty strings as unset so `.env` placeholders fall back to defaults. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return Object.freeze({
    assemblyAiApiKey: values.ASSEMBLYAI_API_KEY,
    port: values.PORT,
    dataDir: resolve(values.ACCENT_DATA_DIR),
    logLevel: values.LOG_LEVEL,
    accentTablePath: values.ACCENT_TABLE_PATH ? resolve(values.ACCENT_TABLE_PATH) : undefined,
    tools: Object.freeze({
      ffmpeg: values.FFMPEG_PATH,
      ffprobe: values.FFPROBE_PATH,
      ytDlp: values.YT_DLP_PATH,
      timeoutMs: values.TOOL_TIMEOUT_MS,
    }),
  });
}

const accentSettingsSchema = envSchema.pick({ ACCENT_TABLE_PATH: true });

/**
 * The accent-table setting alone, for commands that never call the
 * transcription service and so must not require its API key.
 */
export function loadAccentSettings(env: NodeJS.ProcessEnv): Pick<AppConfig, 'accentTablePath'> {
  const parsed = accentSettingsSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${parsed.error.issues[0]?.message ?? 'ACCENT_TABLE_PATH'}`);
  }
  const path = parsed.data.ACCENT_TABLE_PATH;
  return { accentTablePath: path ? resolve(path) : undefined };
}
