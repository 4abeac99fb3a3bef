import { AppConfig } from '../../config/app.config';
import { OperationPolicy } from '../../types/pipeline.type';

export interface InferenceOperationPolicies {
	chat: OperationPolicy;
	completion: OperationPolicy;
	embedding: OperationPolicy;
}

export const OPERATION_POLICIES = Symbol('OPERATION_POLICIES');

export function buildOperationPolicies(config: AppConfig): InferenceOperationPolicies {
	const shared = {
		maxBodyBytes: config.maxBodyBytes,
		requireApiKey: config.requireApiKey,
	};

	return {
		chat: {
			...shared,
			name: 'chat_completions',
			requiredFields: ['messages'],
			rateLimit: config.chatRateLimit,
		},
		completion: {
			...shared,
			name: 'completions',
			requiredFields: ['prompt'],
			rateLimit: config.defaultRateLimit,
		},
		embedding: {
			...shared,
			name: 'embeddings',
			requiredFields: ['input'],
			rateLimit: config.defaultRateLimit,
		},
	};
}
