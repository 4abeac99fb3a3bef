import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { CLOCK, Clock, systemClock } from '../../common/clock';
import { RateLimitConfig, RateLimitResult } from '../../types/rate-limit-type';
import { RATE_WINDOW_STORE, RateWindowStore } from './rate-window.store';

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 60,
	windowSeconds: 60,
};

@Injectable()
export class RateLimiterService {
	private readonly logger = new Logger(RateLimiterService.name);
	private readonly now: Clock;

	constructor(
		@Inject(RATE_WINDOW_STORE) private readonly store: RateWindowStore,
		@Optional() @Inject(CLOCK) clock?: Clock,
	) {
		this.now = clock ?? systemClock;
	}

	/**
	 * Purges the key's window, then records the attempt only when the
	 * window still has room. Rejected attempts leave the window untouched.
	 */
	async consume(key: string, config: RateLimitConfig = DEFAULT_RATE_LIMIT): Promise<RateLimitResult> {
		const nowMs = this.now();
		const windowMs = config.windowSeconds * 1000;

		try {
			const decision = await this.store.record(key, nowMs, windowMs, config.maxRequests);

			if (!decision.allowed) {
				return {
					allowed: false,
					remaining: 0,
					limit: config.maxRequests,
					windowSeconds: config.windowSeconds,
					retryAfterMs:
						decision.oldestMs !== undefined
							? Math.max(0, decision.oldestMs + windowMs - nowMs)
							: windowMs,
				};
			}

			return {
				allowed: true,
				remaining: Math.max(0, config.maxRequests - decision.count),
				limit: config.maxRequests,
				windowSeconds: config.windowSeconds,
			};
		} catch (err) {
			this.logger.error(`Rate limiter failed for ${key}: ${err instanceof Error ? err.message : String(err)}`);
			return {
				allowed: true,
				remaining: 1,
				limit: config.maxRequests,
				windowSeconds: config.windowSeconds,
			};
		}
	}

	async reset(key?: string): Promise<void> {
		await this.store.reset(key);
		this.logger.log(key === undefined ? 'All rate limits cleared' : `Rate limit cleared for ${key}`);
	}
}
