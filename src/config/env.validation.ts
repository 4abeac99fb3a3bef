import { plainToInstance, Transform } from 'class-transformer';
import {
	IsBoolean,
	IsIn,
	IsInt,
	IsOptional,
	IsString,
	IsUrl,
	Max,
	Min,
	validateSync,
} from 'class-validator';
import { MODEL_SIZES, MODEL_TYPES, ModelSize, ModelType } from '../modules/inference/model-catalog';

export const BACKEND_KINDS = ['echo', 'upstream'] as const;
export const RATE_LIMIT_STORES = ['memory', 'redis'] as const;

export class EnvironmentVariables {
	@IsInt()
	@Min(0)
	@Max(65535)
	PORT: number = 5000;

	@IsString()
	HOST: string = '0.0.0.0';

	@IsString()
	CORS_ORIGIN: string = '*';

	@IsInt()
	@Min(1)
	RATE_LIMIT_MAX: number = 60;

	@IsInt()
	@Min(1)
	RATE_LIMIT_WINDOW_SECONDS: number = 60;

	@IsInt()
	@Min(1)
	CHAT_RATE_LIMIT_MAX: number = 30;

	@IsIn(RATE_LIMIT_STORES)
	RATE_LIMIT_STORE: (typeof RATE_LIMIT_STORES)[number] = 'memory';

	@IsInt()
	@Min(1)
	RATE_LIMIT_IDLE_WINDOWS: number = 5;

	@IsString()
	REDIS_HOST: string = 'localhost';

	@IsInt()
	REDIS_PORT: number = 6379;

	@IsOptional()
	@IsString()
	REDIS_PASSWORD?: string;

	@IsInt()
	@Min(0)
	REDIS_DB: number = 0;

	@IsInt()
	@Min(1)
	MAX_CONCURRENT_REQUESTS: number = 10;

	@IsInt()
	@Min(1)
	MAX_BODY_BYTES: number = 1024 * 1024;

	@IsInt()
	@Min(1)
	SECURITY_MAX_DEPTH: number = 10;

	@Transform(({ obj, key }) => [true, 'true', '1'].includes(obj[key]))
	@IsBoolean()
	REQUIRE_API_KEY: boolean = false;

	@IsIn(BACKEND_KINDS)
	INFERENCE_BACKEND: (typeof BACKEND_KINDS)[number] = 'echo';

	@IsOptional()
	@IsUrl({ require_tld: false })
	UPSTREAM_BASE_URL?: string;

	@IsOptional()
	@IsString()
	UPSTREAM_API_KEY?: string;

	@IsInt()
	@Min(1)
	UPSTREAM_TIMEOUT_MS: number = 60_000;

	@IsIn(MODEL_TYPES)
	MODEL_TYPE: ModelType = 'chat';

	@IsIn(MODEL_SIZES)
	MODEL_SIZE: ModelSize = 'small';

	@IsInt()
	@Min(1)
	SLOW_GENERATION_WARN_MS: number = 30_000;
}

/**
 * `validate` hook for ConfigModule. Unknown variables pass through; the
 * ones declared above are converted and checked.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
	const validated = plainToInstance(EnvironmentVariables, config, {
		enableImplicitConversion: true,
	});
	const errors = validateSync(validated, { skipMissingProperties: false });

	if (errors.length > 0) {
		const messages = errors.flatMap((error) => Object.values(error.constraints ?? {}));
		throw new Error(`Invalid environment: ${messages.join('; ')}`);
	}

	if (validated.INFERENCE_BACKEND === 'upstream' && !validated.UPSTREAM_BASE_URL) {
		throw new Error('Invalid environment: UPSTREAM_BASE_URL is required when INFERENCE_BACKEND=upstream');
	}

	return validated;
}
