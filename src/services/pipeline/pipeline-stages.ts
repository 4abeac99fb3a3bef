import { Injectable, Logger } from '@nestjs/common';
import { ErrorTaxonomy } from '../../common/errors/error-taxonomy';
import {
	AuthenticationFailure,
	MalformedRequestFailure,
	ValidationFailure,
} from '../../common/errors/typed-failure';
import { JsonObject } from '../../types/json-value.type';
import { HeaderValue, PipelineContext, PipelineResponse } from '../../types/pipeline.type';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { ResourceAdmissionService } from '../resource-admission.service';
import { SecurityValidator } from '../security/security-validator.service';

export type NextStage = () => Promise<PipelineResponse>;

/**
 * A step of the request pipeline. A stage either calls `next` and returns
 * (possibly decorating) its response, or short-circuits by throwing a
 * TypedFailure or returning a response of its own.
 */
export abstract class PipelineStage {
	protected readonly logger = new Logger(this.constructor.name);

	abstract readonly name: string;

	abstract run(context: PipelineContext, next: NextStage): Promise<PipelineResponse>;
}

export function headerValue(value: HeaderValue): string | undefined {
	return Array.isArray(value) ? value[0] : value;
}

export function requestTooLarge(maxBytes: number): ValidationFailure {
	return new ValidationFailure(`Request too large. Maximum size: ${maxBytes} bytes`);
}

/**
 * Start and end log lines around everything else, including failures
 * rendered by the error boundary.
 */
@Injectable()
export class RequestLoggingStage extends PipelineStage {
	readonly name = 'request-logging';

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		const { method, path } = context.request;
		this.logger.log(
			`[${context.traceId}] Request started: ${method} ${path} from ${context.clientId}`,
		);

		try {
			const response = await next();
			this.logger.log(
				`[${context.traceId}] Request completed: ${method} ${path} -> ${response.status} in ${this.elapsed(context)}s`,
			);
			return response;
		} catch (err) {
			this.logger.error(
				`[${context.traceId}] Request failed: ${method} ${path} in ${this.elapsed(context)}s - ${err instanceof Error ? err.message : String(err)}`,
			);
			throw err;
		}
	}

	private elapsed(context: PipelineContext): string {
		return ((Date.now() - context.startedAt) / 1000).toFixed(3);
	}
}

/**
 * The only place failures become client responses.
 */
@Injectable()
export class ErrorBoundaryStage extends PipelineStage {
	readonly name = 'error-boundary';

	constructor(private readonly taxonomy: ErrorTaxonomy) {
		super();
	}

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		try {
			return await next();
		} catch (err) {
			return this.taxonomy.render(err, {
				operation: context.operation.name,
				traceId: context.traceId,
			});
		}
	}
}

@Injectable()
export class RateLimitStage extends PipelineStage {
	readonly name = 'rate-limit';

	constructor(
		private readonly rateLimiter: RateLimiterService,
		private readonly taxonomy: ErrorTaxonomy,
	) {
		super();
	}

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		const { operation, clientId, traceId } = context;
		const result = await this.rateLimiter.consume(`${operation.name}:${clientId}`, operation.rateLimit);

		if (!result.allowed) {
			return this.taxonomy.renderRateLimited(result, {
				operation: operation.name,
				traceId,
				clientId,
			});
		}

		const response = await next();
		return {
			...response,
			headers: {
				...response.headers,
				'X-RateLimit-Limit': String(result.limit),
				'X-RateLimit-Remaining': String(result.remaining),
			},
		};
	}
}

/**
 * Format check of `Authorization: Bearer <key>` for operations that ask for
 * it. The key itself is not verified against any store.
 */
@Injectable()
export class ApiKeyStage extends PipelineStage {
	readonly name = 'api-key';

	static readonly MIN_KEY_LENGTH = 10;

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		if (!context.operation.requireApiKey) {
			return next();
		}

		const header = headerValue(context.request.headers['authorization']) ?? '';
		if (!header.startsWith('Bearer ')) {
			throw new AuthenticationFailure('Missing or invalid Authorization header');
		}
		if (header.slice('Bearer '.length).length < ApiKeyStage.MIN_KEY_LENGTH) {
			throw new AuthenticationFailure('Invalid API key format');
		}

		return next();
	}
}

/**
 * Content type, size ceiling, JSON parsing and required top-level fields.
 */
@Injectable()
export class PayloadShapeStage extends PipelineStage {
	readonly name = 'payload-shape';

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		const { request, operation } = context;

		if (!this.isJson(headerValue(request.headers['content-type']))) {
			throw new ValidationFailure('Content-Type must be application/json');
		}

		const declaredLength = Number(headerValue(request.headers['content-length']));
		if (Number.isFinite(declaredLength) && declaredLength > operation.maxBodyBytes) {
			throw requestTooLarge(operation.maxBodyBytes);
		}

		const raw = await request.readBody(operation.maxBodyBytes);
		if (raw.trim().length === 0) {
			throw new ValidationFailure('Request body is required');
		}

		const payload = this.parseObject(raw);

		const missing = operation.requiredFields.filter(
			(field) => !Object.prototype.hasOwnProperty.call(payload, field) || payload[field] === null,
		);
		if (missing.length > 0) {
			throw new ValidationFailure(`Missing required fields: ${missing.join(', ')}`, missing.join(', '));
		}

		context.payload = payload;
		return next();
	}

	private isJson(contentType: string | undefined): boolean {
		if (!contentType) {
			return false;
		}
		const mediaType = contentType.split(';')[0].trim().toLowerCase();
		return mediaType === 'application/json' || mediaType.endsWith('+json');
	}

	private parseObject(raw: string): JsonObject {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			throw new MalformedRequestFailure('Invalid JSON format');
		}

		if (!isJsonObject(parsed)) {
			throw new MalformedRequestFailure('Request body must be a JSON object');
		}
		return parsed;
	}
}

function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class SecurityStage extends PipelineStage {
	readonly name = 'security';

	constructor(private readonly validator: SecurityValidator) {
		super();
	}

	async run(context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		this.validator.validate(context.payload);
		return next();
	}
}

/**
 * Holds one unit of compute capacity for the rest of the chain. Release is
 * bound to this scope, not to the response reaching the client.
 */
@Injectable()
export class AdmissionStage extends PipelineStage {
	readonly name = 'admission';

	constructor(private readonly admission: ResourceAdmissionService) {
		super();
	}

	async run(_context: PipelineContext, next: NextStage): Promise<PipelineResponse> {
		const token = this.admission.acquire();
		try {
			return await next();
		} finally {
			token.release();
		}
	}
}
