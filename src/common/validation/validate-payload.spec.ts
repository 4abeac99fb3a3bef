import { ChatCompletionDto } from '../../modules/inference/dto/chat-completion.dto';
import { CompletionDto } from '../../modules/inference/dto/completion.dto';
import { EmbeddingDto } from '../../modules/inference/dto/embedding.dto';
import { ValidationFailure } from '../errors/typed-failure';
import { validatePayload } from './validate-payload';

async function failureOf(run: () => Promise<unknown>): Promise<ValidationFailure> {
	try {
		await run();
	} catch (err) {
		if (err instanceof ValidationFailure) {
			return err;
		}
		throw err;
	}
	throw new Error('expected a ValidationFailure');
}

describe('validatePayload', () => {
	it('returns a populated dto for a valid chat payload', async () => {
		const dto = await validatePayload(ChatCompletionDto, {
			messages: [{ role: 'user', content: 'Hello' }],
			max_tokens: 16,
			temperature: 0.2,
		});

		expect(dto).toBeInstanceOf(ChatCompletionDto);
		expect(dto.messages).toEqual([{ role: 'user', content: 'Hello' }]);
		expect(dto.max_tokens).toBe(16);
	});

	it('rejects temperature outside 0..2 naming the field', async () => {
		const failure = await failureOf(() =>
			validatePayload(ChatCompletionDto, { messages: [{ role: 'user', content: 'Hi' }], temperature: 5 }),
		);

		expect(failure.field).toBe('temperature');
		expect(failure.message).toBe('temperature must be between 0.0 and 2.0');
	});

	it('rejects max_tokens above 4096', async () => {
		const failure = await failureOf(() => validatePayload(CompletionDto, { prompt: 'x', max_tokens: 5000 }));

		expect(failure.field).toBe('max_tokens');
		expect(failure.message).toBe('max_tokens must be between 1 and 4096');
	});

	it('reports nested message paths', async () => {
		const failure = await failureOf(() =>
			validatePayload(ChatCompletionDto, {
				messages: [
					{ role: 'user', content: 'ok' },
					{ role: 'robot', content: 'beep' },
				],
			}),
		);

		expect(failure.field).toBe('messages[1].role');
		expect(failure.message).toBe('role must be one of: system, user, assistant');
	});

	it('rejects an empty messages list', async () => {
		const failure = await failureOf(() => validatePayload(ChatCompletionDto, { messages: [] }));

		expect(failure.field).toBe('messages');
		expect(failure.message).toBe('messages must be a non-empty array');
	});

	it('accepts a string or a list of strings as embedding input', async () => {
		await expect(validatePayload(EmbeddingDto, { input: 'one' })).resolves.toBeInstanceOf(EmbeddingDto);
		await expect(validatePayload(EmbeddingDto, { input: ['one', 'two'] })).resolves.toBeInstanceOf(EmbeddingDto);
	});

	it('rejects embedding input with non-string items', async () => {
		const failure = await failureOf(() => validatePayload(EmbeddingDto, { input: ['one', 2] }));

		expect(failure.field).toBe('input');
		expect(failure.message).toBe('input must be a non-empty string or a non-empty array of strings');
	});
});
