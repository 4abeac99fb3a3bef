import { createTestConfig } from '../../../test/setup/test-setup';
import { buildOperationPolicies } from './operation-policies';

describe('buildOperationPolicies', () => {
	it('gives chat its tighter limit and required field', () => {
		const policies = buildOperationPolicies(createTestConfig());

		expect(policies.chat).toEqual({
			name: 'chat_completions',
			requiredFields: ['messages'],
			rateLimit: { maxRequests: 30, windowSeconds: 60 },
			maxBodyBytes: 1024 * 1024,
			requireApiKey: false,
		});
		expect(policies.completion.rateLimit).toEqual({ maxRequests: 60, windowSeconds: 60 });
		expect(policies.embedding.requiredFields).toEqual(['input']);
	});

	it('applies the api key setting to every operation', () => {
		const policies = buildOperationPolicies(createTestConfig({ requireApiKey: true }));

		expect([policies.chat, policies.completion, policies.embedding].every((policy) => policy.requireApiKey)).toBe(true);
	});
});
