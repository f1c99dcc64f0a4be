import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  return value;
};

export const CACHE_BACKENDS = ['redis', 'memory'] as const;
export type CacheBackend = (typeof CACHE_BACKENDS)[number];

/**
 * Environment accepted by the service. Every key has a default so a bare
 * `.env` (or none at all) is enough for local runs.
 */
export class EnvironmentVariables {
  @IsString()
  ENVIRONMENT: string = 'local';

  @Transform(toBoolean)
  @IsBoolean()
  DEBUG: boolean = false;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8000;

  @IsString()
  HOST: string = '0.0.0.0';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  WEB_CONCURRENCY: number = 4;

  @IsString()
  REDIS_URL: string = 'redis://localhost';

  @IsIn([...CACHE_BACKENDS])
  CACHE_BACKEND: CacheBackend = 'redis';

  @IsString()
  CACHE_PREFIX: string = 'media-cache';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CACHE_TTL_SECONDS: number = 15;

  @IsOptional()
  @IsString()
  INST_USERNAME?: string;

  @IsOptional()
  @IsString()
  INST_PASSWORD?: string;

  @IsString()
  CHROME_BINARY: string = 'google-chrome';

  @IsString()
  CHROMEDRIVER_DIR: string = './chromedriver';

  @IsOptional()
  @IsString()
  CHROMEDRIVER_PATH?: string;

  @Transform(toBoolean)
  @IsBoolean()
  SKIP_DRIVER_PROVISIONING: boolean = false;

  @IsString()
  CORS_ORIGINS: string = '*';
}

/**
 * `validate` hook for ConfigModule.forRoot, also used by the primary process
 * before Nest is up. Throws listing every failed constraint.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
