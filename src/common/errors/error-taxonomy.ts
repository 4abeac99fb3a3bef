import { Injectable, Logger } from '@nestjs/common';
import { ErrorBody, PipelineResponse } from '../../types/pipeline.type';
import { RateLimitResult } from '../../types/rate-limit-type';
import { AnyTypedFailure, toTypedFailure, UnhandledFailure } from './typed-failure';

export const SECURITY_VIOLATION_MESSAGE = 'Security violation detected';
export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

export interface FailureOrigin {
	operation: string;
	traceId?: string;
}

/**
 * Single mapping from failures to HTTP responses. Every call logs once:
 * 4xx at warn, 5xx at error with the stack attached.
 */
@Injectable()
export class ErrorTaxonomy {
	private readonly logger = new Logger(ErrorTaxonomy.name);

	render(error: unknown, origin: FailureOrigin): PipelineResponse<ErrorBody> {
		const failure = toTypedFailure(error);
		const response = this.toResponse(failure);

		const prefix = `[${origin.traceId ?? '-'}] ${failure.name} in ${origin.operation}`;
		if (response.status >= 500) {
			this.logger.error(`${prefix}: ${failure.message}`, this.stackOf(failure));
		} else {
			this.logger.warn(`${prefix}: ${failure.message}`);
		}

		return response;
	}

	renderRateLimited(
		result: RateLimitResult,
		origin: FailureOrigin & { clientId: string },
	): PipelineResponse<ErrorBody> {
		this.logger.warn(
			`[${origin.traceId ?? '-'}] Rate limit exceeded in ${origin.operation} for ${origin.clientId}`,
		);

		const retryAfterSeconds = Math.max(1, Math.ceil((result.retryAfterMs ?? 0) / 1000));
		return {
			status: 429,
			headers: { 'Retry-After': String(retryAfterSeconds) },
			body: {
				error: {
					type: 'rate_limit_error',
					code: 'RATE_LIMIT_EXCEEDED',
					message: `Rate limit exceeded: ${result.limit} requests per ${result.windowSeconds} seconds`,
				},
			},
		};
	}

	private toResponse(failure: AnyTypedFailure): PipelineResponse<ErrorBody> {
		switch (failure.kind) {
			case 'validation':
				return {
					status: 400,
					body: {
						error: {
							type: 'validation_error',
							code: 'VALIDATION_FAILED',
							message: failure.message,
							...(failure.field !== undefined && { field: failure.field }),
						},
					},
				};
			case 'security':
				return {
					status: 403,
					body: {
						error: {
							type: 'security_error',
							code: failure.code,
							message: SECURITY_VIOLATION_MESSAGE,
						},
					},
				};
			case 'resource':
				return {
					status: 503,
					body: {
						error: {
							type: 'resource_error',
							code: 'RESOURCE_UNAVAILABLE',
							message: failure.message,
							resource_type: failure.resourceKind,
						},
					},
				};
			case 'malformed_request':
				return {
					status: 400,
					body: {
						error: {
							type: 'bad_request',
							code: 'INVALID_REQUEST',
							message: failure.message || 'Invalid request format',
						},
					},
				};
			case 'authentication':
				return {
					status: 401,
					headers: { 'WWW-Authenticate': 'Bearer' },
					body: {
						error: {
							type: 'authentication_error',
							code: 'UNAUTHORIZED',
							message: failure.message,
						},
					},
				};
			case 'unhandled':
				return {
					status: 500,
					body: {
						error: {
							type: 'internal_error',
							code: 'INTERNAL_SERVER_ERROR',
							message: INTERNAL_ERROR_MESSAGE,
						},
					},
				};
		}
	}

	private stackOf(failure: AnyTypedFailure): string | undefined {
		if (failure instanceof UnhandledFailure && failure.cause instanceof Error) {
			return failure.cause.stack;
		}
		return failure.stack;
	}
}
