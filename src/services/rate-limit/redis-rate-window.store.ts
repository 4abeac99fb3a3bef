import { OnModuleDestroy } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type Redis from 'ioredis';
import { RateWindowStore, WindowDecision } from './rate-window.store';

/**
 * Sliding log kept in a sorted set scored by arrival time. The script runs
 * atomically on the server, so concurrent gateway instances share windows.
 */
const SLIDING_WINDOW_LUA = `-- KEYS[1] = window key
-- ARGV[1] = now (ms)
-- ARGV[2] = window (ms)
-- ARGV[3] = max requests
-- ARGV[4] = member id

local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local max = tonumber(ARGV[3])

redis.call("ZREMRANGEBYSCORE", KEYS[1], "-inf", now - window)

local count = redis.call("ZCARD", KEYS[1])

if count >= max then
  local oldest = redis.call("ZRANGE", KEYS[1], 0, 0, "WITHSCORES")
  local oldestScore = 0
  if oldest[2] then
    oldestScore = tonumber(oldest[2])
  end
  return { 0, count, oldestScore }
end

redis.call("ZADD", KEYS[1], now, ARGV[4])
redis.call("PEXPIRE", KEYS[1], window)

return { 1, count + 1, 0 }`;

export type RedisWindowClient = Pick<Redis, 'eval' | 'del' | 'scan' | 'quit' | 'disconnect' | 'status'>;

export class RedisRateWindowStore implements RateWindowStore, OnModuleDestroy {
	constructor(
		private readonly redis: RedisWindowClient,
		private readonly prefix = 'ratelimit:',
	) {}

	async record(
		key: string,
		nowMs: number,
		windowMs: number,
		maxRequests: number,
	): Promise<WindowDecision> {
		const reply = await this.redis.eval(
			SLIDING_WINDOW_LUA,
			1,
			this.prefix + key,
			nowMs,
			windowMs,
			maxRequests,
			`${nowMs}-${randomUUID()}`,
		);

		const [allowed, count, oldest] = this.parseReply(reply);
		return allowed === 1
			? { allowed: true, count }
			: { allowed: false, count, ...(oldest > 0 && { oldestMs: oldest }) };
	}

	async reset(key?: string): Promise<void> {
		if (key !== undefined) {
			await this.redis.del(this.prefix + key);
			return;
		}

		let cursor = '0';
		do {
			const [nextCursor, keys] = await this.redis.scan(cursor, 'MATCH', `${this.prefix}*`, 'COUNT', 100);
			cursor = nextCursor;
			if (keys.length > 0) {
				await this.redis.del(...keys);
			}
		} while (cursor !== '0');
	}

	async onModuleDestroy(): Promise<void> {
		if (this.redis.status === 'ready') {
			await this.redis.quit();
			return;
		}
		this.redis.disconnect();
	}

	private parseReply(reply: unknown): [number, number, number] {
		if (!Array.isArray(reply) || reply.length !== 3) {
			throw new Error(`Unexpected rate window reply: ${JSON.stringify(reply)}`);
		}
		const [allowed, count, oldest] = reply.map((part) => Number(part));
		return [allowed, count, oldest];
	}
}
