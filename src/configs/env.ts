/* eslint-disable node/no-process-env */
import { config } from 'dotenv';
import { expand } from 'dotenv-expand';
import path from 'path';
import { z } from 'zod';
import { InvalidArgumentError } from '@/configs/errors';

expand(
  config({
    path: path.resolve(
      process.cwd(),
      process.env.NODE_ENV === 'test' ? '.env.test' : '.env'
    ),
  })
);

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'silent'] as const;

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('debug'),
  LOG_DIR: z.string().min(1).optional(),
  MONGO_URI: z.string().default('mongodb://127.0.0.1:27017/sequences'),
  SEQUENCE_COLLECTION: z.string().default('collection.ids'),
  SEQUENCE_STEP: z.coerce.bigint().default(1n),
  SEQUENCE_INITIAL_VALUE: z.coerce.bigint().min(0n).default(1n),
});

// Logging must come up even when the counter settings are wrong
const LogEnvSchema = z.object({
  NODE_ENV: z.string().catch('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('debug'),
  LOG_DIR: z.string().min(1).optional().catch(undefined),
});

export type Env = z.infer<typeof EnvSchema>;
export type LogEnv = z.infer<typeof LogEnvSchema>;

type EnvSource = Record<string, string | undefined>;

export function loadEnv(source: EnvSource = process.env): Env {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new InvalidArgumentError(
      'Invalid environment configuration',
      z.flattenError(parsed.error).fieldErrors
    );
  }

  return parsed.data;
}

export function loadLogEnv(source: EnvSource = process.env): LogEnv {
  return LogEnvSchema.parse(source);
}

let cached: Env | undefined;

/** Environment configuration, parsed on first use. */
export default function getEnv(): Env {
  cached ??= loadEnv();
  return cached;
}
