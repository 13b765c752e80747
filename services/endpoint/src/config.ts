import 'dotenv/config';
import { z } from 'zod';

// allow either string or number, then coerce to a non-negative integer
const intFromEnv = (fallback: number) =>
  z.preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z.number().int().nonnegative().default(fallback),
  );

const envSchema = z.object({
  PORT: intFromEnv(8004),
  HOST: z.string().min(1).default('127.0.0.1'),
  BASE_PATH: z
    .string()
    .default('/mcp_endpoint')
    .transform((path) => `/${path.replace(/^\/+|\/+$/g, '')}`),
  SERVER_KEY: z.string().default(''),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CALL_TIMEOUT_MS: intFromEnv(30_000),
  BROADCAST_TIMEOUT_MS: intFromEnv(10_000),
  FANOUT_METHODS: z.string().default(''),
  IDLE_TIMEOUT_S: intFromEnv(0),
  SWEEP_INTERVAL_S: intFromEnv(60),
  PING_INTERVAL_S: intFromEnv(30),
  MAX_PAYLOAD_BYTES: intFromEnv(1024 * 1024),
  DUPLICATE_SERVER_POLICY: z.enum(['supersede', 'reject']).default('supersede'),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface EndpointConfig {
  port: number;
  host: string;
  basePath: string;
  serverKey: string;
  logLevel: LogLevel;
  callTimeoutMs: number;
  broadcastTimeoutMs: number;
  fanOutMethods: string[];
  // 0 disables the idle sweep
  idleTimeoutMs: number;
  sweepIntervalMs: number;
  // websocket keepalive; a pong counts as activity. 0 disables it
  pingIntervalMs: number;
  maxPayloadBytes: number;
  duplicateServerPolicy: 'supersede' | 'reject';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EndpointConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    basePath: e.BASE_PATH,
    serverKey: e.SERVER_KEY,
    logLevel: e.LOG_LEVEL,
    callTimeoutMs: e.CALL_TIMEOUT_MS,
    broadcastTimeoutMs: e.BROADCAST_TIMEOUT_MS,
    fanOutMethods: e.FANOUT_METHODS.split(',')
      .map((method) => method.trim())
      .filter((method) => method.length > 0),
    idleTimeoutMs: e.IDLE_TIMEOUT_S * 1000,
    sweepIntervalMs: Math.max(1, e.SWEEP_INTERVAL_S) * 1000,
    pingIntervalMs: e.PING_INTERVAL_S * 1000,
    maxPayloadBytes: e.MAX_PAYLOAD_BYTES,
    duplicateServerPolicy: e.DUPLICATE_SERVER_POLICY,
  };
}

export const config = loadConfig();
