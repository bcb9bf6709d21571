import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

function toBoolean({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') return value;
  const v = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(v)) return true;
  if (['false', '0', 'no', 'off', ''].includes(v)) return false;
  return value;
}

/** Raw environment as read by ConfigModule, before it is shaped into AppConfig. */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  APP_NAME?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGIN?: string;

  @IsOptional()
  @IsString()
  MONGODB_URI?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_TRANSACTIONS?: boolean;

  @IsOptional()
  @IsString()
  @MinLength(8)
  JWT_SECRET?: string;

  @IsOptional()
  @IsIn(JWT_ALGORITHMS)
  JWT_ALGORITHM?: JwtAlgorithm;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  EXPOSE_RESET_TOKEN?: boolean;

  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  LLM_API_BASE?: string;

  @IsOptional()
  @IsString()
  LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  LLM_API_TOKEN?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1000)
  LLM_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(5)
  LLM_MAX_RETRIES?: number;

  @IsOptional()
  @IsString()
  SYSTEM_PROMPT?: string;

  @IsOptional()
  @IsString()
  ADMIN_USER?: string;

  @IsOptional()
  @IsString()
  ADMIN_EMAIL?: string;

  @IsOptional()
  @IsString()
  @MinLength(8)
  ADMIN_PASSWORD?: string;
}

/** `validate` hook for ConfigModule.forRoot: fails start-up on a malformed environment. */
export function validateEnv(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  if (validated.NODE_ENV === 'production' && !validated.JWT_SECRET) {
    throw new Error('Missing required environment variables: JWT_SECRET');
  }
  return validated;
}
