import { Inject, Injectable, Logger } from '@nestjs/common';
import { ResourceFailure } from '../../common/errors/typed-failure';
import { validatePayload } from '../../common/validation/validate-payload';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { JsonObject } from '../../types/json-value.type';
import { PipelineContext } from '../../types/pipeline.type';
import { ResourceKind } from '../../types/resource-kind.type';
import {
	GenerationParams,
	GenerationResult,
	INFERENCE_BACKEND,
	InferenceBackend,
} from './backends/inference-backend';
import { ChatCompletionDto } from './dto/chat-completion.dto';
import { CompletionDto } from './dto/completion.dto';
import { EmbeddingDto } from './dto/embedding.dto';
import { GenerationParamsDto } from './dto/generation-params.dto';
import { MODEL_CATALOG, MODEL_TYPES } from './model-catalog';

const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;

export interface Usage {
	prompt_tokens: number;
	completion_tokens?: number;
	total_tokens: number;
}

export interface ChatCompletionResponse {
	id: string;
	object: 'chat.completion';
	created: number;
	model: string;
	choices: Array<{
		index: number;
		message: { role: 'assistant'; content: string };
		finish_reason: GenerationResult['finishReason'];
	}>;
	usage: Usage;
}

export interface CompletionResponse {
	id: string;
	object: 'text_completion';
	created: number;
	model: string;
	choices: Array<{ text: string; index: number; finish_reason: GenerationResult['finishReason'] }>;
	usage: Usage;
}

export interface EmbeddingResponse {
	object: 'list';
	data: Array<{ object: 'embedding'; embedding: number[]; index: number }>;
	model: string;
	usage: Usage;
}

export interface ModelEntry {
	id: string;
	object: 'model';
	created: number;
	owned_by: 'local';
}

function unixSeconds(): number {
	return Math.floor(Date.now() / 1000);
}

/**
 * Operation handlers run by the request pipeline once a payload has been
 * admitted. Parameter validation happens here, after the security scan.
 */
@Injectable()
export class InferenceService {
	private readonly logger = new Logger(InferenceService.name);

	constructor(
		@Inject(INFERENCE_BACKEND) private readonly backend: InferenceBackend,
		@Inject(APP_CONFIG) private readonly config: AppConfig,
	) {}

	async chat(payload: JsonObject, context: PipelineContext): Promise<ChatCompletionResponse> {
		this.assertReady();
		const dto = await validatePayload(ChatCompletionDto, payload);
		const params = this.paramsFrom(dto, MODEL_CATALOG[this.config.model.size].chat);

		this.logger.log(
			`[${context.traceId}] Processing chat completion: ${dto.messages.length} messages, max_tokens=${params.maxTokens}`,
		);

		const result = await this.timed(context, 'chat completion', () =>
			this.backend.chat(
				dto.messages.map(({ role, content }) => ({ role, content })),
				params,
			),
		);

		return {
			id: `chatcmpl-${Date.now()}`,
			object: 'chat.completion',
			created: unixSeconds(),
			model: params.model,
			choices: [
				{
					index: 0,
					message: { role: 'assistant', content: result.text.trim() },
					finish_reason: result.finishReason,
				},
			],
			usage: this.usageOf(result),
		};
	}

	async complete(payload: JsonObject, context: PipelineContext): Promise<CompletionResponse> {
		this.assertReady();
		const dto = await validatePayload(CompletionDto, payload);
		const params = this.paramsFrom(dto, MODEL_CATALOG[this.config.model.size].completion);

		this.logger.log(`[${context.traceId}] Completion request with prompt length: ${dto.prompt.length}`);

		const result = await this.timed(context, 'completion', () => this.backend.complete(dto.prompt, params));

		return {
			id: `cmpl-${Date.now()}`,
			object: 'text_completion',
			created: unixSeconds(),
			model: params.model,
			choices: [{ text: result.text.trim(), index: 0, finish_reason: result.finishReason }],
			usage: this.usageOf(result),
		};
	}

	async embed(payload: JsonObject, context: PipelineContext): Promise<EmbeddingResponse> {
		this.assertReady();
		const dto = await validatePayload(EmbeddingDto, payload);
		const inputs = typeof dto.input === 'string' ? [dto.input] : dto.input;
		const model = dto.model ?? MODEL_CATALOG[this.config.model.size].embedding;

		this.logger.log(`[${context.traceId}] Embedding request with ${inputs.length} inputs`);

		const result = await this.timed(context, 'embedding', () => this.backend.embed(inputs, model));

		return {
			object: 'list',
			data: result.vectors.map((embedding, index) => ({ object: 'embedding', embedding, index })),
			model,
			usage: { prompt_tokens: result.promptTokens, total_tokens: result.promptTokens },
		};
	}

	listModels(): { object: 'list'; data: ModelEntry[] } {
		const created = unixSeconds() - 10_000;
		const entry = (id: string): ModelEntry => ({ id, object: 'model', created, owned_by: 'local' });

		const data = MODEL_TYPES.map((type) => entry(MODEL_CATALOG.small[type]));
		if (this.config.model.size !== 'small') {
			const size = this.config.model.size;
			data.push(...MODEL_TYPES.map((type) => entry(MODEL_CATALOG[size][type])));
		}

		return { object: 'list', data };
	}

	isBackendReady(): boolean {
		return this.backend.isReady();
	}

	get backendKind(): string {
		return this.backend.kind;
	}

	private assertReady(): void {
		if (!this.backend.isReady()) {
			throw new ResourceFailure('Model not loaded', ResourceKind.Model);
		}
	}

	private paramsFrom(dto: GenerationParamsDto, defaultModel: string): GenerationParams {
		return {
			model: dto.model ?? defaultModel,
			maxTokens: dto.max_tokens ?? DEFAULT_MAX_TOKENS,
			temperature: dto.temperature ?? DEFAULT_TEMPERATURE,
		};
	}

	private usageOf(result: GenerationResult): Usage {
		return {
			prompt_tokens: result.promptTokens,
			completion_tokens: result.completionTokens,
			total_tokens: result.promptTokens + result.completionTokens,
		};
	}

	/**
	 * Slow generations are reported, not cut off: no deadline reaches the
	 * backend from here.
	 */
	private async timed<T>(context: PipelineContext, label: string, call: () => Promise<T>): Promise<T> {
		const started = Date.now();
		const result = await call();
		const elapsedMs = Date.now() - started;

		if (elapsedMs > this.config.slowGenerationWarnMs) {
			this.logger.warn(
				`[${context.traceId}] ${label} took ${(elapsedMs / 1000).toFixed(2)}s, might be too slow`,
			);
		}
		return result;
	}
}
