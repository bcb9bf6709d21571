import { JWT_ALGORITHMS, JwtAlgorithm } from './env.validation';

export interface DatabaseConfig {
  uri: string;
  /** Multi-document writes run in a MongoDB transaction (needs a replica set). */
  transactions: boolean;
}

export interface AuthConfig {
  jwtSecret: string;
  jwtAlgorithm: JwtAlgorithm;
  accessTokenExpireMinutes: number;
  exposeResetToken: boolean;
}

export interface LlmConfig {
  apiBase: string;
  model: string;
  apiToken: string | null;
  timeoutMs: number;
  maxRetries: number;
  systemPrompt: string;
}

export interface AdminConfig {
  username: string;
  email: string;
  password: string;
}

export interface AppConfig {
  appName: string;
  port: number;
  corsOrigins: string[];
  database: DatabaseConfig;
  auth: AuthConfig;
  llm: LlmConfig;
  admin: AdminConfig | null;
}

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://127.0.0.1:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173',
];

type Env = Record<string, string | undefined>;

function str(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

function int(env: Env, key: string, fallback: number): number {
  const v = str(env, key);
  if (v === undefined) return fallback;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? fallback : n;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const v = str(env, key)?.toLowerCase();
  if (v === undefined) return fallback;
  return ['true', '1', 'yes', 'on'].includes(v);
}

function jwtAlgorithm(env: Env): JwtAlgorithm {
  const v = str(env, 'JWT_ALGORITHM');
  return JWT_ALGORITHMS.find((a) => a === v) ?? 'HS256';
}

/**
 * Build the immutable application config from environment variables.
 * Registered with ConfigModule.forRoot({ load }) and read through ConfigService.
 */
export function buildConfig(env: Env = process.env): AppConfig {
  const corsOrigin = str(env, 'CORS_ORIGIN');
  const origins = corsOrigin
    ? corsOrigin.split(',').map((o) => o.trim()).filter(Boolean)
    : [];

  const adminUser = str(env, 'ADMIN_USER');
  const adminPassword = env.ADMIN_PASSWORD;
  const admin: AdminConfig | null =
    adminUser && adminPassword
      ? {
          username: adminUser,
          email: str(env, 'ADMIN_EMAIL') ?? `${adminUser}@localhost`,
          password: adminPassword,
        }
      : null;

  const config: AppConfig = {
    appName: str(env, 'APP_NAME') ?? 'Nutrition Chat',
    port: int(env, 'PORT', 3000),
    corsOrigins: [...origins, ...DEV_ORIGINS],
    database: {
      uri: str(env, 'MONGODB_URI') ?? 'mongodb://localhost:27017/nutrition-chat',
      transactions: bool(env, 'DB_TRANSACTIONS', true),
    },
    auth: {
      jwtSecret: str(env, 'JWT_SECRET') ?? 'change-me',
      jwtAlgorithm: jwtAlgorithm(env),
      accessTokenExpireMinutes: int(env, 'ACCESS_TOKEN_EXPIRE_MINUTES', 60),
      exposeResetToken: bool(env, 'EXPOSE_RESET_TOKEN', false),
    },
    llm: {
      apiBase: str(env, 'LLM_API_BASE') ?? 'http://localhost:11434/v1',
      model: str(env, 'LLM_MODEL') ?? 'llama3.2:1b',
      apiToken: str(env, 'LLM_API_TOKEN') ?? null,
      timeoutMs: int(env, 'LLM_TIMEOUT_MS', 120_000),
      maxRetries: int(env, 'LLM_MAX_RETRIES', 0),
      systemPrompt: env.SYSTEM_PROMPT ?? 'You are a helpful assistant.',
    },
    admin,
  };
  return deepFreeze(config);
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export default (): AppConfig => buildConfig();
