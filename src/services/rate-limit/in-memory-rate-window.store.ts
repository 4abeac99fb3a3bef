import { Logger } from '@nestjs/common';
import { RateWindowStore, WindowDecision } from './rate-window.store';

interface Bucket {
	timestamps: number[];
	windowMs: number;
}

export interface InMemoryRateWindowStoreOptions {
	/** Buckets idle for this many of their own windows are evicted. */
	idleWindows?: number;
	/** Minimum gap between two eviction sweeps. */
	sweepIntervalMs?: number;
}

/**
 * Process-local window store. `record` runs synchronously before its
 * returned promise settles, so no other request interleaves with a bucket
 * update.
 */
export class InMemoryRateWindowStore implements RateWindowStore {
	private readonly logger = new Logger(InMemoryRateWindowStore.name);
	private readonly buckets = new Map<string, Bucket>();
	private readonly idleWindows: number;
	private readonly sweepIntervalMs: number;
	private lastSweepMs = 0;

	constructor(options: InMemoryRateWindowStoreOptions = {}) {
		this.idleWindows = options.idleWindows ?? 5;
		this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
	}

	async record(
		key: string,
		nowMs: number,
		windowMs: number,
		maxRequests: number,
	): Promise<WindowDecision> {
		this.maybeSweep(nowMs);

		const cutoff = nowMs - windowMs;
		const bucket = this.buckets.get(key) ?? { timestamps: [], windowMs };
		bucket.windowMs = windowMs;
		bucket.timestamps = bucket.timestamps.filter((timestamp) => timestamp > cutoff);

		if (bucket.timestamps.length >= maxRequests) {
			this.buckets.set(key, bucket);
			return {
				allowed: false,
				count: bucket.timestamps.length,
				oldestMs: bucket.timestamps[0],
			};
		}

		bucket.timestamps.push(nowMs);
		this.buckets.set(key, bucket);
		return { allowed: true, count: bucket.timestamps.length };
	}

	async reset(key?: string): Promise<void> {
		if (key === undefined) {
			this.buckets.clear();
			return;
		}
		this.buckets.delete(key);
	}

	size(): number {
		return this.buckets.size;
	}

	private maybeSweep(nowMs: number): void {
		if (nowMs - this.lastSweepMs < this.sweepIntervalMs) {
			return;
		}
		this.lastSweepMs = nowMs;

		let evicted = 0;
		for (const [key, bucket] of this.buckets) {
			const newest = bucket.timestamps[bucket.timestamps.length - 1];
			if (newest === undefined || newest <= nowMs - bucket.windowMs * this.idleWindows) {
				this.buckets.delete(key);
				evicted++;
			}
		}

		if (evicted > 0) {
			this.logger.debug(`Evicted ${evicted} idle rate-limit buckets`);
		}
	}
}
