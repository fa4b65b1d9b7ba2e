import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Shape of the environment read by the core. Every key is optional: services
 * fall back to their own defaults through `config.get(...) ?? default`.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  ASSISTANT_DB_PATH?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  INTENT_FAST_PATH_THRESHOLD?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  INTENT_ACCEPTANCE_THRESHOLD?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  INTENT_MODEL_CONFIDENCE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  INTENT_QUERY_CACHE_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  WEATHER_TTL_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  EVENTS_TTL_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  TODOS_TTL_SECONDS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  HISTORY_WINDOW_HOURS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  HISTORY_MAX_MESSAGES?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_SMALL_MODEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  OLLAMA_TIMEOUT_MS?: number;
}

export function validateEnv(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: true });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid assistant configuration: ${details}`);
  }
  return validated;
}
