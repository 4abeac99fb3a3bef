import { Logger } from '@nestjs/common';
import { ResourceFailure } from '../../../common/errors/typed-failure';
import { ResourceKind } from '../../../types/resource-kind.type';
import {
	ChatMessage,
	EmbeddingResult,
	GenerationParams,
	GenerationResult,
	InferenceBackend,
} from './inference-backend';

export interface UpstreamBackendOptions {
	baseUrl: string;
	apiKey?: string;
	timeoutMs: number;
}

type Obj = Record<string, unknown>;

function asObj(value: unknown): Obj | null {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
		? Object.fromEntries(Object.entries(value))
		: null;
}

function asNumber(value: unknown): number {
	return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Forwards requests to an OpenAI-compatible HTTP endpoint. Transport
 * failures, timeouts and non-2xx answers surface as backend ResourceFailures.
 */
export class UpstreamBackend implements InferenceBackend {
	readonly kind = 'upstream';
	private readonly logger = new Logger(UpstreamBackend.name);
	private readonly baseUrl: string;

	constructor(private readonly options: UpstreamBackendOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
	}

	isReady(): boolean {
		return this.baseUrl.length > 0;
	}

	async chat(messages: ChatMessage[], params: GenerationParams): Promise<GenerationResult> {
		const body = await this.post('/v1/chat/completions', {
			model: params.model,
			messages,
			max_tokens: params.maxTokens,
			temperature: params.temperature,
		});
		const choice = this.firstChoice(body);
		const message = asObj(choice.message);
		return this.toGeneration(body, choice, message?.content);
	}

	async complete(prompt: string, params: GenerationParams): Promise<GenerationResult> {
		const body = await this.post('/v1/completions', {
			model: params.model,
			prompt,
			max_tokens: params.maxTokens,
			temperature: params.temperature,
		});
		const choice = this.firstChoice(body);
		return this.toGeneration(body, choice, choice.text);
	}

	async embed(inputs: string[], model: string): Promise<EmbeddingResult> {
		const body = await this.post('/v1/embeddings', { model, input: inputs });
		const data = Array.isArray(body.data) ? body.data : [];

		const vectors = data.map((item) => {
			const embedding = asObj(item)?.embedding;
			if (!Array.isArray(embedding) || !embedding.every((n) => typeof n === 'number')) {
				throw this.unexpected('embedding entry without a numeric vector');
			}
			return embedding.map((n) => asNumber(n));
		});
		if (vectors.length !== inputs.length) {
			throw this.unexpected(`expected ${inputs.length} embeddings, got ${vectors.length}`);
		}

		return { vectors, promptTokens: asNumber(asObj(body.usage)?.prompt_tokens) };
	}

	private async post(path: string, payload: Obj): Promise<Obj> {
		const headers: Record<string, string> = { 'Content-Type': 'application/json' };
		if (this.options.apiKey) {
			headers.Authorization = `Bearer ${this.options.apiKey}`;
		}

		let response: Response;
		try {
			response = await fetch(`${this.baseUrl}${path}`, {
				method: 'POST',
				headers,
				body: JSON.stringify(payload),
				signal: AbortSignal.timeout(this.options.timeoutMs),
			});
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			this.logger.error(`Upstream ${path} unreachable: ${reason}`);
			throw new ResourceFailure('Inference backend unavailable', ResourceKind.Backend);
		}

		if (!response.ok) {
			const detail = await response.text().catch(() => '');
			this.logger.error(`Upstream ${path} responded ${response.status}: ${detail.slice(0, 500)}`);
			throw new ResourceFailure(`Inference backend responded with ${response.status}`, ResourceKind.Backend);
		}

		let parsed: unknown;
		try {
			parsed = await response.json();
		} catch {
			throw this.unexpected('response is not JSON');
		}

		const body = asObj(parsed);
		if (!body) {
			throw this.unexpected('response is not an object');
		}
		return body;
	}

	private firstChoice(body: Obj): Obj {
		const choice = Array.isArray(body.choices) ? asObj(body.choices[0]) : null;
		if (!choice) {
			throw this.unexpected('no choices returned');
		}
		return choice;
	}

	private toGeneration(body: Obj, choice: Obj, text: unknown): GenerationResult {
		if (typeof text !== 'string') {
			throw this.unexpected('choice has no text');
		}
		const usage = asObj(body.usage);
		return {
			text,
			promptTokens: asNumber(usage?.prompt_tokens),
			completionTokens: asNumber(usage?.completion_tokens),
			finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
		};
	}

	private unexpected(reason: string): ResourceFailure {
		this.logger.error(`Unexpected upstream response: ${reason}`);
		return new ResourceFailure('Inference backend returned an unexpected response', ResourceKind.Backend);
	}
}
