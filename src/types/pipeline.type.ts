import { RateLimitConfig } from './rate-limit-type';
import { JsonObject } from './json-value.type';

export type HeaderValue = string | string[] | undefined;

/**
 * Transport-neutral view of an inbound request. The body is read lazily so
 * cheap stages can reject a request before any bytes are consumed.
 */
export interface InboundRequest {
	method: string;
	path: string;
	headers: Record<string, HeaderValue>;
	remoteAddress?: string;
	readBody(limitBytes: number): Promise<string>;
}

export interface OperationPolicy {
	name: string;
	requiredFields: readonly string[];
	rateLimit: RateLimitConfig;
	maxBodyBytes: number;
	requireApiKey: boolean;
}

export interface PipelineResponse<T = unknown> {
	status: number;
	body: T;
	headers?: Record<string, string>;
}

export interface PipelineContext {
	traceId: string;
	clientId: string;
	startedAt: number;
	operation: OperationPolicy;
	request: InboundRequest;
	payload?: JsonObject;
}

export type OperationHandler<T = unknown> = (
	payload: JsonObject,
	context: PipelineContext,
) => Promise<T>;

export interface ErrorBody {
	error: {
		type: string;
		code: string;
		message: string;
		field?: string;
		resource_type?: string;
	};
}
