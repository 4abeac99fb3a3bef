import { buildAppConfig, loadAppConfig } from './app.config';
import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
	it('applies defaults to an empty environment', () => {
		const env = validateEnvironment({});

		expect(env.PORT).toBe(5000);
		expect(env.RATE_LIMIT_MAX).toBe(60);
		expect(env.CHAT_RATE_LIMIT_MAX).toBe(30);
		expect(env.MAX_CONCURRENT_REQUESTS).toBe(10);
		expect(env.REQUIRE_API_KEY).toBe(false);
		expect(env.INFERENCE_BACKEND).toBe('echo');
	});

	it('converts numeric strings', () => {
		const env = validateEnvironment({ PORT: '8080', MAX_CONCURRENT_REQUESTS: '3' });

		expect(env.PORT).toBe(8080);
		expect(env.MAX_CONCURRENT_REQUESTS).toBe(3);
	});

	it.each([
		['true', true],
		['1', true],
		['false', false],
		['0', false],
	])('reads REQUIRE_API_KEY=%p as %p', (raw, expected) => {
		expect(validateEnvironment({ REQUIRE_API_KEY: raw }).REQUIRE_API_KEY).toBe(expected);
	});

	it('rejects out-of-range values', () => {
		expect(() => validateEnvironment({ MAX_CONCURRENT_REQUESTS: '0' })).toThrow(/^Invalid environment: /);
	});

	it('rejects an unknown backend', () => {
		expect(() => validateEnvironment({ INFERENCE_BACKEND: 'gpu' })).toThrow(/^Invalid environment: /);
	});

	it('requires a base url for the upstream backend', () => {
		expect(() => validateEnvironment({ INFERENCE_BACKEND: 'upstream' })).toThrow(
			'Invalid environment: UPSTREAM_BASE_URL is required when INFERENCE_BACKEND=upstream',
		);
	});
});

describe('buildAppConfig', () => {
	it('groups the variables by concern', () => {
		const config = buildAppConfig(
			validateEnvironment({
				RATE_LIMIT_WINDOW_SECONDS: '30',
				CHAT_RATE_LIMIT_MAX: '5',
				INFERENCE_BACKEND: 'upstream',
				UPSTREAM_BASE_URL: 'http://localhost:8000',
				MODEL_SIZE: 'medium',
			}),
		);

		expect(config.chatRateLimit).toEqual({ maxRequests: 5, windowSeconds: 30 });
		expect(config.defaultRateLimit).toEqual({ maxRequests: 60, windowSeconds: 30 });
		expect(config.backend).toEqual({
			kind: 'upstream',
			baseUrl: 'http://localhost:8000',
			apiKey: undefined,
			timeoutMs: 60_000,
		});
		expect(config.model).toEqual({ type: 'chat', size: 'medium' });
	});

	it('loads from a plain environment map', () => {
		expect(loadAppConfig({ RATE_LIMIT_STORE: 'redis', REDIS_PORT: '6380' }).redis).toEqual({
			host: 'localhost',
			port: 6380,
			password: undefined,
			db: 0,
		});
	});
});
