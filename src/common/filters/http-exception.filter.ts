import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ErrorBody } from '../../types/pipeline.type';
import { ErrorTaxonomy, INTERNAL_ERROR_MESSAGE } from '../errors/error-taxonomy';
import { sendPipelineResponse } from '../http/express-adapter';

function errorFor(status: number, message: string): ErrorBody['error'] {
	if (status === HttpStatus.NOT_FOUND) {
		return { type: 'not_found', code: 'NOT_FOUND', message };
	}
	if (status === HttpStatus.SERVICE_UNAVAILABLE) {
		return { type: 'resource_error', code: 'RESOURCE_UNAVAILABLE', message };
	}
	if (status >= 500) {
		return { type: 'internal_error', code: 'INTERNAL_SERVER_ERROR', message: INTERNAL_ERROR_MESSAGE };
	}
	return { type: 'bad_request', code: 'INVALID_REQUEST', message };
}

/**
 * Renders anything that escapes outside the request pipeline (unknown
 * routes, framework errors) in the same error envelope. Framework
 * exceptions keep their own status.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	constructor(private readonly taxonomy: ErrorTaxonomy) {}

	catch(exception: unknown, host: ArgumentsHost): void {
		const http = host.switchToHttp();
		const res = http.getResponse<Response>();
		const req = http.getRequest<{ method?: string; url?: string }>();
		const operation = `${req.method ?? '-'} ${req.url ?? '-'}`;

		if (exception instanceof HttpException) {
			const status = exception.getStatus();
			if (status >= 500) {
				this.logger.error(`${operation}: ${exception.message}`, exception.stack);
			} else {
				this.logger.warn(`${operation}: ${exception.message}`);
			}
			sendPipelineResponse(res, { status, body: { error: errorFor(status, exception.message) } });
			return;
		}

		sendPipelineResponse(res, this.taxonomy.render(exception, { operation }));
	}
}
