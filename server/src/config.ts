import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  AUTHORITY_TOKEN: z.string().min(8).optional(),
  ADVERTISE_ADDRESS: z.string().min(1).optional(),
  SESSION_CODE_LENGTH: z.coerce.number().int().min(4).max(32).default(8),
  SESSION_PASSWORD_LENGTH: z.coerce.number().int().min(3).max(128).default(12),
  ENDED_SESSION_RETENTION_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  MAX_PARTICIPANTS: z.coerce.number().int().positive().default(200),
  AUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  THROTTLE_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  THROTTLE_RETENTION_MS: z.coerce.number().int().positive().default(60_000),
  FOCUS_ACK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAX_OUTSTANDING_FRAMES: z.coerce.number().int().min(1).default(2),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),
});

function loadConfig(): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  return result.data;
}

const parsed = loadConfig();

export type QualityName = 'low' | 'medium' | 'high';

export interface QualityTier {
  /** Target spacing between captures. */
  frameIntervalMs: number;
  /** Resolution factor applied by the capturer. */
  scale: number;
  jpegQuality: number;
}

export const APP_VERSION = '0.1.0';

export const qualityTiers: Readonly<Record<QualityName, QualityTier>> = {
  low: { frameIntervalMs: 100, scale: 0.5, jpegQuality: 40 },
  medium: { frameIntervalMs: 66, scale: 0.75, jpegQuality: 60 },
  high: { frameIntervalMs: 50, scale: 1, jpegQuality: 80 },
};

export const config = {
  port: parsed.PORT,
  host: parsed.HOST,
  nodeEnv: parsed.NODE_ENV,
  logLevel: parsed.LOG_LEVEL,
  authorityToken: parsed.AUTHORITY_TOKEN,
  advertiseAddress: parsed.ADVERTISE_ADDRESS,
  codeLength: parsed.SESSION_CODE_LENGTH,
  passwordLength: parsed.SESSION_PASSWORD_LENGTH,
  endedSessionRetentionMs: parsed.ENDED_SESSION_RETENTION_MS,
  maxParticipants: parsed.MAX_PARTICIPANTS,
  authTimeoutMs: parsed.AUTH_TIMEOUT_MS,
  heartbeatMs: parsed.HEARTBEAT_INTERVAL_MS,
  connectionTimeoutMs: parsed.CONNECTION_TIMEOUT_MS,
  throttleIntervalMs: parsed.THROTTLE_INTERVAL_MS,
  throttleRetentionMs: parsed.THROTTLE_RETENTION_MS,
  focusAckTimeoutMs: parsed.FOCUS_ACK_TIMEOUT_MS,
  maxOutstandingFrames: parsed.MAX_OUTSTANDING_FRAMES,
  corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
};
