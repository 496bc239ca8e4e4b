/**
 * Story Agent Configuration
 *
 * Reads a .env file (when present) and the process environment.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import type { ServerConfig } from '@storyteller/a2a';
import { DEFAULT_WORD_COUNT } from './engine.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  PUBLIC_URL: z.string().url().optional(),
  STORY_WORD_COUNT: z.coerce.number().int().positive().default(DEFAULT_WORD_COUNT),
});

export interface StoryAgentConfig {
  server: ServerConfig;
  wordCount: number;
}

export interface LoadConfigOptions {
  /** Path of the .env file; defaults to .env in the working directory */
  envFile?: string;
  /** Variables to read instead of process.env; no .env file is loaded */
  env?: Record<string, string | undefined>;
}

export function loadConfig(options: LoadConfigOptions = {}): StoryAgentConfig {
  let env = options.env;
  if (!env) {
    const envPath = resolve(options.envFile ?? '.env');
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
      console.log(`[Config] Loaded from ${envPath}`);
    }
    env = process.env;
  }

  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  return {
    server: {
      name: 'StoryAgent',
      port: parsed.data.PORT,
      host: parsed.data.HOST,
      publicUrl: parsed.data.PUBLIC_URL,
    },
    wordCount: parsed.data.STORY_WORD_COUNT,
  };
}

/** Empty variables count as unset */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}
