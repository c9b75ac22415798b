/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. `loadConfig` is called once at startup and
 * the resulting object is passed explicitly to the app and the renderer.
 */
import dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { OPENAI_VOICES } from '../ai/tts/voices';
import type { VoiceProfile } from '../types';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Speed range accepted by the OpenAI speech endpoint. */
const speedSchema = z.coerce.number().min(0.25).max(4);

const voiceSchema = z.enum(OPENAI_VOICES);

const voiceProfileSchema = z.object({
  voice: voiceSchema,
  speed: speedSchema.default(1),
});

const voiceTableSchema = z.record(z.string(), voiceProfileSchema);

export const DEFAULT_VOICE_PROFILES: Readonly<Record<string, VoiceProfile>> = {
  DR_ARJUN: { voice: 'onyx', speed: 1.0 },
  RIYA: { voice: 'nova', speed: 1.05 },
};

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  API_PREFIX: z.string().default(''),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY not set in environment'),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_TTS_MODEL: z.string().trim().min(1).default('gpt-4o-mini-tts'),

  AUDIO_OUTPUT_DIR: z.string().default('generated_audio'),
  AUDIO_STATIC_PATH: z.string().default('/audio'),
  PUBLIC_BASE_URL: z.string().optional(),
  AUDIO_PROBE_DURATION: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),

  VOICE_PROFILES: z.string().optional(),
  DEFAULT_VOICE: voiceSchema.default('onyx'),
  DEFAULT_SPEED: speedSchema.default(1),
});

export interface AppConfig {
  env: string;
  port: number;
  host: string;
  apiPrefix: string;
  logLevel: string;

  ai: {
    openaiApiKey: string;
    openaiBaseUrl?: string;
    ttsModel: string;
  };

  voices: {
    profiles: Readonly<Record<string, VoiceProfile>>;
    fallback: VoiceProfile;
  };

  storage: {
    /** Absolute path of the directory generated tracks are written to. */
    outputDir: string;
    staticPath: string;
    /** No trailing slash. */
    publicBaseUrl: string;
    probeDuration: boolean;
  };
}

type EnvSource = Record<string, string | undefined>;

/** Blank values count as unset so `.env` placeholders fall back to defaults. */
function withoutBlanks(env: EnvSource): EnvSource {
  const out: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

function parseVoiceTable(raw: string | undefined): Record<string, VoiceProfile> {
  if (!raw) return { ...DEFAULT_VOICE_PROFILES };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`VOICE_PROFILES is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = voiceTableSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`VOICE_PROFILES is invalid: ${formatIssues(parsed.error)}`);
  }

  const table: Record<string, VoiceProfile> = {};
  for (const [speaker, profile] of Object.entries(parsed.data)) {
    table[speaker.trim().toUpperCase()] = profile;
  }
  return table;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function normalizeStaticPath(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, '');
  if (!trimmed) return '/audio';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    apiPrefix: e.API_PREFIX.replace(/\/+$/, ''),
    logLevel: e.LOG_LEVEL,

    ai: {
      openaiApiKey: e.OPENAI_API_KEY,
      openaiBaseUrl: e.OPENAI_BASE_URL,
      ttsModel: e.OPENAI_TTS_MODEL,
    },

    voices: {
      profiles: parseVoiceTable(e.VOICE_PROFILES),
      fallback: { voice: e.DEFAULT_VOICE, speed: e.DEFAULT_SPEED },
    },

    storage: {
      outputDir: path.resolve(process.cwd(), e.AUDIO_OUTPUT_DIR),
      staticPath: normalizeStaticPath(e.AUDIO_STATIC_PATH),
      publicBaseUrl: (e.PUBLIC_BASE_URL ?? `http://localhost:${e.PORT}`).replace(/\/+$/, ''),
      probeDuration: e.AUDIO_PROBE_DURATION,
    },
  };
}
