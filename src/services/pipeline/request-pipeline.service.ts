import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { MalformedRequestFailure } from '../../common/errors/typed-failure';
import {
	InboundRequest,
	OperationHandler,
	OperationPolicy,
	PipelineContext,
	PipelineResponse,
} from '../../types/pipeline.type';
import {
	AdmissionStage,
	ApiKeyStage,
	ErrorBoundaryStage,
	headerValue,
	NextStage,
	PayloadShapeStage,
	PipelineStage,
	RateLimitStage,
	RequestLoggingStage,
	SecurityStage,
} from './pipeline-stages';

/**
 * Client identity used as the rate-limit bucket key: first hop of
 * X-Forwarded-For, else the peer address. Not an authenticated principal.
 */
export function resolveClientId(request: InboundRequest): string {
	const forwarded = headerValue(request.headers['x-forwarded-for']);
	const firstHop = forwarded?.split(',')[0]?.trim();
	return firstHop || request.remoteAddress || 'unknown';
}

function resolveTraceId(request: InboundRequest): string {
	return headerValue(request.headers['x-trace-id']) || `trace-${Date.now()}-${randomUUID().slice(0, 8)}`;
}

/**
 * Runs every protected operation through the same fixed sequence of stages:
 * logging, error boundary, rate limit, API-key stub, payload shape,
 * security scan, admission, then the handler.
 */
@Injectable()
export class RequestPipeline {
	private readonly stages: readonly PipelineStage[];

	constructor(
		logging: RequestLoggingStage,
		errorBoundary: ErrorBoundaryStage,
		rateLimit: RateLimitStage,
		apiKey: ApiKeyStage,
		payloadShape: PayloadShapeStage,
		security: SecurityStage,
		admission: AdmissionStage,
	) {
		this.stages = [logging, errorBoundary, rateLimit, apiKey, payloadShape, security, admission];
	}

	async run<T>(
		operation: OperationPolicy,
		request: InboundRequest,
		handler: OperationHandler<T>,
	): Promise<PipelineResponse> {
		const context: PipelineContext = {
			traceId: resolveTraceId(request),
			clientId: resolveClientId(request),
			startedAt: Date.now(),
			operation,
			request,
		};

		const terminal: NextStage = async () => {
			if (!context.payload) {
				throw new MalformedRequestFailure('Request body is required');
			}
			const body = await handler(context.payload, context);
			return { status: 200, body };
		};

		const chain = this.stages.reduceRight<NextStage>(
			(next, stage) => () => stage.run(context, next),
			terminal,
		);

		const response = await chain();
		return {
			...response,
			headers: { ...response.headers, 'X-Trace-Id': context.traceId },
		};
	}

	getStatus(): { stages: string[]; count: number; status: 'active' } {
		return {
			stages: this.stages.map((stage) => stage.name),
			count: this.stages.length,
			status: 'active',
		};
	}
}
