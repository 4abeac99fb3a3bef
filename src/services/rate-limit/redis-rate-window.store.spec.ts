import { createMockRedis } from '../../../test/setup/test-setup';
import { RedisRateWindowStore } from './redis-rate-window.store';

describe('RedisRateWindowStore', () => {
	let redis: ReturnType<typeof createMockRedis>;
	let store: RedisRateWindowStore;

	beforeEach(() => {
		redis = createMockRedis();
		store = new RedisRateWindowStore(redis);
	});

	it('runs the window script against the prefixed key', async () => {
		redis.eval.mockResolvedValue([1, 3, 0]);

		const decision = await store.record('chat_completions:10.0.0.1', 5_000, 60_000, 30);

		expect(decision).toEqual({ allowed: true, count: 3 });
		const [script, numKeys, key, now, window, max, member] = redis.eval.mock.calls[0];
		expect(script).toContain('ZREMRANGEBYSCORE');
		expect(numKeys).toBe(1);
		expect(key).toBe('ratelimit:chat_completions:10.0.0.1');
		expect([now, window, max]).toEqual([5_000, 60_000, 30]);
		expect(member).toMatch(/^5000-/);
	});

	it('passes the oldest score back on rejection', async () => {
		redis.eval.mockResolvedValue([0, 30, '1200']);

		expect(await store.record('k', 5_000, 60_000, 30)).toEqual({ allowed: false, count: 30, oldestMs: 1_200 });
	});

	it('omits the oldest score when the script has none', async () => {
		redis.eval.mockResolvedValue([0, 30, 0]);

		expect(await store.record('k', 5_000, 60_000, 30)).toEqual({ allowed: false, count: 30 });
	});

	it('throws on an unexpected reply', async () => {
		redis.eval.mockResolvedValue('OK');

		await expect(store.record('k', 5_000, 60_000, 30)).rejects.toThrow('Unexpected rate window reply: "OK"');
	});

	it('deletes a single key', async () => {
		await store.reset('k');
		expect(redis.del).toHaveBeenCalledWith('ratelimit:k');
	});

	it('scans and deletes every prefixed key', async () => {
		redis.scan
			.mockResolvedValueOnce(['7', ['ratelimit:a', 'ratelimit:b']])
			.mockResolvedValueOnce(['0', ['ratelimit:c']]);

		await store.reset();

		expect(redis.scan).toHaveBeenNthCalledWith(1, '0', 'MATCH', 'ratelimit:*', 'COUNT', 100);
		expect(redis.scan).toHaveBeenNthCalledWith(2, '7', 'MATCH', 'ratelimit:*', 'COUNT', 100);
		expect(redis.del).toHaveBeenCalledWith('ratelimit:a', 'ratelimit:b');
		expect(redis.del).toHaveBeenCalledWith('ratelimit:c');
	});

	it('quits a ready connection on shutdown', async () => {
		await store.onModuleDestroy();
		expect(redis.quit).toHaveBeenCalled();
		expect(redis.disconnect).not.toHaveBeenCalled();
	});

	it('drops a connection that never became ready', async () => {
		redis.status = 'connecting';

		await store.onModuleDestroy();

		expect(redis.disconnect).toHaveBeenCalled();
		expect(redis.quit).not.toHaveBeenCalled();
	});
});
