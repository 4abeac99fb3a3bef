export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
	role: ChatRole;
	content: string;
}

export interface GenerationParams {
	model: string;
	maxTokens: number;
	temperature: number;
}

export interface GenerationResult {
	text: string;
	promptTokens: number;
	completionTokens: number;
	finishReason: 'stop' | 'length';
}

export interface EmbeddingResult {
	vectors: number[][];
	promptTokens: number;
}

/**
 * Handle to whatever produces completions. Chosen once at startup and
 * injected; request handling never swaps it.
 */
export interface InferenceBackend {
	readonly kind: string;
	isReady(): boolean;
	chat(messages: ChatMessage[], params: GenerationParams): Promise<GenerationResult>;
	complete(prompt: string, params: GenerationParams): Promise<GenerationResult>;
	embed(inputs: string[], model: string): Promise<EmbeddingResult>;
}

export const INFERENCE_BACKEND = Symbol('INFERENCE_BACKEND');

export function countTokens(text: string): number {
	const trimmed = text.trim();
	return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}
