import { Logger } from '@nestjs/common';
import { ResourceFailure } from '../../../common/errors/typed-failure';
import { UpstreamBackend } from './upstream.backend';

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('UpstreamBackend', () => {
	let fetchSpy: jest.SpyInstance;
	const backend = new UpstreamBackend({ baseUrl: 'http://upstream.test/', apiKey: 'test-secret', timeoutMs: 1_000 });
	const params = { model: 'tiny', maxTokens: 32, temperature: 0.2 };

	beforeEach(() => {
		fetchSpy = jest.spyOn(global, 'fetch');
		jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
	});

	afterEach(() => {
		jest.restoreAllMocks();
	});

	it('posts chat requests with the bearer key', async () => {
		fetchSpy.mockResolvedValue(
			jsonResponse({
				choices: [{ message: { role: 'assistant', content: 'Hi!' }, finish_reason: 'stop' }],
				usage: { prompt_tokens: 4, completion_tokens: 1 },
			}),
		);

		const result = await backend.chat([{ role: 'user', content: 'Hello' }], params);

		expect(result).toEqual({ text: 'Hi!', promptTokens: 4, completionTokens: 1, finishReason: 'stop' });
		const [url, init] = fetchSpy.mock.calls[0];
		expect(url).toBe('http://upstream.test/v1/chat/completions');
		expect(init.method).toBe('POST');
		expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
		expect(JSON.parse(init.body)).toEqual({
			model: 'tiny',
			messages: [{ role: 'user', content: 'Hello' }],
			max_tokens: 32,
			temperature: 0.2,
		});
	});

	it('reads completion text and the length finish reason', async () => {
		fetchSpy.mockResolvedValue(jsonResponse({ choices: [{ text: 'and then', finish_reason: 'length' }] }));

		const result = await backend.complete('Once', params);

		expect(result).toEqual({ text: 'and then', promptTokens: 0, completionTokens: 0, finishReason: 'length' });
	});

	it('returns one vector per input', async () => {
		fetchSpy.mockResolvedValue(
			jsonResponse({ data: [{ embedding: [0.1, 0.2] }, { embedding: [0.3, 0.4] }], usage: { prompt_tokens: 2 } }),
		);

		await expect(backend.embed(['a', 'b'], 'mini')).resolves.toEqual({
			vectors: [
				[0.1, 0.2],
				[0.3, 0.4],
			],
			promptTokens: 2,
		});
	});

	it('maps non-2xx answers to a backend resource failure', async () => {
		fetchSpy.mockResolvedValue(jsonResponse({ error: 'overloaded' }, 502));

		await expect(backend.complete('x', params)).rejects.toEqual(
			new ResourceFailure('Inference backend responded with 502', 'backend'),
		);
	});

	it('maps transport errors to a backend resource failure', async () => {
		fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

		const failure = await backend.complete('x', params).catch((err: unknown) => err);

		expect(failure).toBeInstanceOf(ResourceFailure);
		expect(failure).toMatchObject({ message: 'Inference backend unavailable', resourceKind: 'backend' });
	});

	it('rejects a reply with a missing vector', async () => {
		fetchSpy.mockResolvedValue(jsonResponse({ data: [{ embedding: [0.1] }] }));

		await expect(backend.embed(['a', 'b'], 'mini')).rejects.toMatchObject({
			message: 'Inference backend returned an unexpected response',
		});
	});
});
