import { createHash } from 'crypto';
import {
	ChatMessage,
	countTokens,
	EmbeddingResult,
	GenerationParams,
	GenerationResult,
	InferenceBackend,
} from './inference-backend';

export const ECHO_EMBEDDING_DIMENSIONS = 16;

/**
 * Deterministic local backend. Replies by repeating the input, which keeps
 * the service usable without a model and makes responses predictable.
 */
export class EchoBackend implements InferenceBackend {
	readonly kind = 'echo';

	isReady(): boolean {
		return true;
	}

	async chat(messages: ChatMessage[], params: GenerationParams): Promise<GenerationResult> {
		const lastUser = [...messages].reverse().find((message) => message.role === 'user');
		const promptTokens = messages.reduce((sum, message) => sum + countTokens(message.content), 0);
		return this.reply(lastUser?.content ?? '', promptTokens, params.maxTokens);
	}

	async complete(prompt: string, params: GenerationParams): Promise<GenerationResult> {
		return this.reply(prompt, countTokens(prompt), params.maxTokens);
	}

	async embed(inputs: string[]): Promise<EmbeddingResult> {
		return {
			vectors: inputs.map((input) => this.vectorFor(input)),
			promptTokens: inputs.reduce((sum, input) => sum + countTokens(input), 0),
		};
	}

	private reply(source: string, promptTokens: number, maxTokens: number): GenerationResult {
		const words = source.trim().split(/\s+/).filter((word) => word.length > 0);
		const kept = words.slice(0, maxTokens);
		return {
			text: kept.join(' '),
			promptTokens,
			completionTokens: kept.length,
			finishReason: kept.length < words.length ? 'length' : 'stop',
		};
	}

	private vectorFor(input: string): number[] {
		const digest = createHash('sha256').update(input).digest();
		const raw = Array.from({ length: ECHO_EMBEDDING_DIMENSIONS }, (_, i) => digest[i] - 127.5);
		const norm = Math.sqrt(raw.reduce((sum, value) => sum + value * value, 0));
		return raw.map((value) => value / norm);
	}
}
