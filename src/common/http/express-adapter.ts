import type { Request, Response } from 'express';
import getRawBody from 'raw-body';
import type { Readable } from 'stream';
import { requestTooLarge } from '../../services/pipeline/pipeline-stages';
import { InboundRequest, PipelineResponse } from '../../types/pipeline.type';
import { MalformedRequestFailure } from '../errors/typed-failure';

function isTooLarge(err: unknown): boolean {
	return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

export type RawRequest = Readable &
	Pick<Request, 'method' | 'path' | 'headers'> & { socket: { remoteAddress?: string } };

/**
 * Wraps an Express request whose body has not been consumed. Requires the
 * application to be created with `bodyParser: false`.
 */
export function toInboundRequest(req: RawRequest): InboundRequest {
	return {
		method: req.method,
		path: req.path,
		headers: req.headers,
		remoteAddress: req.socket.remoteAddress,
		readBody: async (limitBytes: number) => {
			try {
				return await getRawBody(req, { limit: limitBytes, encoding: 'utf-8' });
			} catch (err) {
				if (isTooLarge(err)) {
					throw requestTooLarge(limitBytes);
				}
				throw new MalformedRequestFailure('Request body could not be read');
			}
		},
	};
}

export type ResponseSink = Pick<Response, 'setHeader' | 'status' | 'json'>;

export function sendPipelineResponse(res: ResponseSink, response: PipelineResponse): void {
	for (const [name, value] of Object.entries(response.headers ?? {})) {
		res.setHeader(name, value);
	}
	res.status(response.status).json(response.body);
}
