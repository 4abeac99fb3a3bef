export type ModelType = 'chat' | 'completion' | 'embedding';
export type ModelSize = 'small' | 'medium' | 'large';

export const MODEL_CATALOG: Record<ModelSize, Record<ModelType, string>> = {
	small: {
		chat: 'TinyLlama/TinyLlama-1.1B-Chat-v1.0',
		completion: 'microsoft/phi-2',
		embedding: 'sentence-transformers/all-MiniLM-L6-v2',
	},
	medium: {
		chat: 'TinyLlama/TinyLlama-1.1B-Chat-v1.0',
		completion: 'microsoft/phi-2',
		embedding: 'sentence-transformers/all-MiniLM-L6-v2',
	},
	large: {
		chat: 'HuggingFaceH4/mistral-7b-instruct-v0.2',
		completion: 'google/gemma-2b',
		embedding: 'intfloat/e5-large-v2',
	},
};

export const MODEL_TYPES: readonly ModelType[] = ['chat', 'completion', 'embedding'];
export const MODEL_SIZES: readonly ModelSize[] = ['small', 'medium', 'large'];
