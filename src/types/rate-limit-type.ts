export interface RateLimitConfig {
	maxRequests: number;
	windowSeconds: number;
}

export interface RateLimitResult {
	allowed: boolean;
	remaining: number;
	limit: number;
	windowSeconds: number;
	retryAfterMs?: number;
}
