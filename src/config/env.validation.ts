import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';
import { SIGNING_ALGORITHMS } from './jwt.config';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose'] as const;

/**
 * Environment variables read at start-up.
 *
 * Database and token settings are required; everything else has a default
 * in the matching `registerAs` namespace.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  MONGO_URL!: string;

  @IsString()
  @IsNotEmpty()
  MONGO_DB_NAME!: string;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET_KEY!: string;

  @IsOptional()
  @IsIn(SIGNING_ALGORITHMS)
  JWT_ALGORITHM?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ACCESS_TOKEN_EXPIRE_MINUTES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_CALLS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_PERIOD?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(4)
  @Max(31)
  BCRYPT_SALT_ROUNDS?: number;

  @IsOptional()
  @IsIn(['truncate', 'reject'])
  PASSWORD_OVERFLOW_POLICY?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;
}

function formatErrors(errors: ValidationError[]): string[] {
  return errors.flatMap(error =>
    Object.values(error.constraints ?? {}).map(message => `${error.property}: ${message}`),
  );
}

/**
 * `ConfigModule` validate hook. Throws with every problem listed so a
 * misconfigured process never starts.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const env = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration:\n${formatErrors(errors).join('\n')}`);
  }

  return config;
}
