import { RateLimitConfig } from '../types/rate-limit-type';
import { EnvironmentVariables, validateEnvironment } from './env.validation';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
	port: number;
	host: string;
	corsOrigin: string;
	defaultRateLimit: RateLimitConfig;
	chatRateLimit: RateLimitConfig;
	rateLimitStore: EnvironmentVariables['RATE_LIMIT_STORE'];
	rateLimitIdleWindows: number;
	redis: {
		host: string;
		port: number;
		password?: string;
		db: number;
	};
	maxConcurrentRequests: number;
	maxBodyBytes: number;
	securityMaxDepth: number;
	requireApiKey: boolean;
	backend: {
		kind: EnvironmentVariables['INFERENCE_BACKEND'];
		baseUrl?: string;
		apiKey?: string;
		timeoutMs: number;
	};
	model: {
		type: EnvironmentVariables['MODEL_TYPE'];
		size: EnvironmentVariables['MODEL_SIZE'];
	};
	slowGenerationWarnMs: number;
}

export function buildAppConfig(env: EnvironmentVariables): AppConfig {
	return {
		port: env.PORT,
		host: env.HOST,
		corsOrigin: env.CORS_ORIGIN,
		defaultRateLimit: {
			maxRequests: env.RATE_LIMIT_MAX,
			windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
		},
		chatRateLimit: {
			maxRequests: env.CHAT_RATE_LIMIT_MAX,
			windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
		},
		rateLimitStore: env.RATE_LIMIT_STORE,
		rateLimitIdleWindows: env.RATE_LIMIT_IDLE_WINDOWS,
		redis: {
			host: env.REDIS_HOST,
			port: env.REDIS_PORT,
			password: env.REDIS_PASSWORD,
			db: env.REDIS_DB,
		},
		maxConcurrentRequests: env.MAX_CONCURRENT_REQUESTS,
		maxBodyBytes: env.MAX_BODY_BYTES,
		securityMaxDepth: env.SECURITY_MAX_DEPTH,
		requireApiKey: env.REQUIRE_API_KEY,
		backend: {
			kind: env.INFERENCE_BACKEND,
			baseUrl: env.UPSTREAM_BASE_URL,
			apiKey: env.UPSTREAM_API_KEY,
			timeoutMs: env.UPSTREAM_TIMEOUT_MS,
		},
		model: {
			type: env.MODEL_TYPE,
			size: env.MODEL_SIZE,
		},
		slowGenerationWarnMs: env.SLOW_GENERATION_WARN_MS,
	};
}

/** Configuration with every default applied, for tests and tooling. */
export function defaultAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
	return { ...buildAppConfig(new EnvironmentVariables()), ...overrides };
}

export function loadAppConfig(env: Record<string, unknown> = process.env): AppConfig {
	return buildAppConfig(validateEnvironment(env));
}
