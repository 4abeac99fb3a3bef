import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import type Redis from 'ioredis';
import { AppConfig, defaultAppConfig } from '../../src/config/app.config';
import { HeaderValue, InboundRequest, OperationPolicy, PipelineContext } from '../../src/types/pipeline.type';

/**
 * Create mock Redis client
 */
export const createMockRedis = (): {
	eval: jest.Mock;
	del: jest.Mock;
	scan: jest.Mock;
	quit: jest.Mock;
	disconnect: jest.Mock;
	status: Redis['status'];
} => {
	const status: Redis['status'] = 'ready';
	return {
		eval: jest.fn(),
		del: jest.fn().mockResolvedValue(1),
		scan: jest.fn().mockResolvedValue(['0', []]),
		quit: jest.fn().mockResolvedValue('OK'),
		disconnect: jest.fn(),
		status,
	};
};

/**
 * Mock inference backend with immediate answers
 */
export const createMockBackend = () => ({
	kind: 'mock',
	isReady: jest.fn().mockReturnValue(true),
	chat: jest.fn().mockResolvedValue({ text: 'hi there', promptTokens: 2, completionTokens: 2, finishReason: 'stop' }),
	complete: jest.fn().mockResolvedValue({ text: 'the end', promptTokens: 3, completionTokens: 2, finishReason: 'stop' }),
	embed: jest.fn().mockResolvedValue({ vectors: [[0.6, 0.8]], promptTokens: 1 }),
});

export interface FakeRequestInit {
	method?: string;
	path?: string;
	headers?: Record<string, HeaderValue>;
	remoteAddress?: string;
	body?: string | object;
}

/**
 * In-process InboundRequest. `readBody` is a jest.fn so tests can check
 * whether a stage consumed the body.
 */
export const createInboundRequest = (init: FakeRequestInit = {}) => {
	const body = init.body === undefined ? '' : typeof init.body === 'string' ? init.body : JSON.stringify(init.body);
	const readBody = jest.fn(async (_limitBytes: number) => body);
	const headers: Record<string, HeaderValue> = { 'content-type': 'application/json', ...init.headers };
	const request: InboundRequest & { readBody: typeof readBody } = {
		method: init.method ?? 'POST',
		path: init.path ?? '/v1/chat/completions',
		headers,
		remoteAddress: init.remoteAddress ?? '10.0.0.1',
		readBody,
	};
	return request;
};

export const createTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => defaultAppConfig(overrides);

export const createOperationPolicy = (overrides: Partial<OperationPolicy> = {}): OperationPolicy => ({
	name: 'chat_completions',
	requiredFields: ['messages'],
	rateLimit: { maxRequests: 30, windowSeconds: 60 },
	maxBodyBytes: 1024 * 1024,
	requireApiKey: false,
	...overrides,
});

export const createPipelineContext = (overrides: Partial<PipelineContext> = {}): PipelineContext => ({
	traceId: 'trace-test',
	clientId: '10.0.0.1',
	startedAt: Date.now(),
	operation: createOperationPolicy(),
	request: createInboundRequest(),
	...overrides,
});

/**
 * ArgumentsHost for exception filters, backed by a mock Express response
 */
export const createArgumentsHost = (request: { method?: string; url?: string } = {}) => {
	const response = {
		setHeader: jest.fn(),
		status: jest.fn().mockReturnThis(),
		json: jest.fn().mockReturnThis(),
	};
	return { response, host: new ExecutionContextHost([request, response]) };
};
