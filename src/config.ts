import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { randomNickname } from './lib/nicknames.js';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const port = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  ROLE: z.enum(['host', 'viewer']).default('host'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PROCESS_LOG_DIR: z.string().optional(),

  BIND_ADDRESS: z.string().default('0.0.0.0'),
  WS_PORT: port.default(10086),
  SRT_INPUT_PORT: port.default(9001),
  RTMP_PORT: port.default(1935),
  SRT_BASE_PORT: port.default(10000),
  PORT_PROBE_ATTEMPTS: z.coerce.number().int().positive().default(100),
  PORT_PROBE_ALLOW_MISSING_IPV6: booleanFlag.default('false'),
  VERIFICATION_CODE: z
    .string()
    .regex(/^\d{6}$/, 'VERIFICATION_CODE must be six digits')
    .default('114514'),
  NICKNAME: z.string().trim().min(1).max(20).optional(),

  SERVER_HOST: z.string().default('127.0.0.1'),
  SERVER_PORT: port.default(10086),
  CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RECONNECT_INTERVAL_MS: z.coerce.number().int().nonnegative().default(3_000),
  MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().nonnegative().default(5),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  WS_PING_INTERVAL_MS: z.coerce.number().int().positive().default(20_000),

  RESTART_DELAY_MS: z.coerce.number().int().nonnegative().default(3_000),
  STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  ENABLE_LOCAL_PLAY: booleanFlag.default('true'),
  PLAYER_START_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  FFMPEG_PATH: z.string().default(path.join('.', 'ffmpeg')),
  MPV_PATH: z.string().default(path.join('.', 'mpv')),
  NGINX_PATH: z.string().default(path.join('.', 'rtmp', 'nginx')),

  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),
});

const parsed = envSchema.parse(process.env);

export const config = {
  role: parsed.ROLE,
  logLevel: parsed.LOG_LEVEL,
  processLogDir: parsed.PROCESS_LOG_DIR,

  bindAddress: parsed.BIND_ADDRESS,
  wsPort: parsed.WS_PORT,
  srtInputPort: parsed.SRT_INPUT_PORT,
  rtmpPort: parsed.RTMP_PORT,
  srtBasePort: parsed.SRT_BASE_PORT,
  portProbeAttempts: parsed.PORT_PROBE_ATTEMPTS,
  portProbe: { allowMissingIpv6: parsed.PORT_PROBE_ALLOW_MISSING_IPV6 },
  verificationCode: parsed.VERIFICATION_CODE,
  nickname: parsed.NICKNAME ?? randomNickname(),

  serverHost: parsed.SERVER_HOST,
  serverPort: parsed.SERVER_PORT,
  connectionTimeoutMs: parsed.CONNECTION_TIMEOUT_MS,
  reconnectIntervalMs: parsed.RECONNECT_INTERVAL_MS,
  maxReconnectAttempts: parsed.MAX_RECONNECT_ATTEMPTS,
  heartbeatIntervalMs: parsed.HEARTBEAT_INTERVAL_MS,
  pingIntervalMs: parsed.WS_PING_INTERVAL_MS,

  restartDelayMs: parsed.RESTART_DELAY_MS,
  stopTimeoutMs: parsed.STOP_TIMEOUT_MS,
  enableLocalPlay: parsed.ENABLE_LOCAL_PLAY,
  playerStartDelayMs: parsed.PLAYER_START_DELAY_MS,
  programs: {
    ffmpeg: parsed.FFMPEG_PATH,
    mpv: parsed.MPV_PATH,
    nginx: parsed.NGINX_PATH,
  },

  corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
};

export type AppConfig = typeof config;
