export interface WindowDecision {
	allowed: boolean;
	/** Entries in the window after this call. */
	count: number;
	/** Timestamp of the oldest entry still in the window, when rejected. */
	oldestMs?: number;
}

/**
 * Storage for sliding-window request logs. `record` must be atomic per key:
 * purge, count and append happen as one step with respect to other callers
 * of the same key.
 */
export interface RateWindowStore {
	record(key: string, nowMs: number, windowMs: number, maxRequests: number): Promise<WindowDecision>;
	reset(key?: string): Promise<void>;
}

export const RATE_WINDOW_STORE = Symbol('RATE_WINDOW_STORE');
