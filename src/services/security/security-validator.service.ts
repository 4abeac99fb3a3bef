import { Injectable } from '@nestjs/common';
import {
	ContentScanner,
	DepthLimiter,
	KeyNameGuard,
	PayloadCheck,
	PayloadNode,
	SizeLimiter,
} from './payload-checks';

export interface SecurityValidatorOptions {
	maxDepth?: number;
	maxStringLength?: number;
	maxListLength?: number;
}

/**
 * Depth-first, document-order scan of an untrusted payload. The first
 * violation aborts the whole scan with a SecurityFailure.
 */
@Injectable()
export class SecurityValidator {
	constructor(private readonly checks: readonly PayloadCheck[]) {}

	static withDefaults(options: SecurityValidatorOptions = {}): SecurityValidator {
		return new SecurityValidator([
			new DepthLimiter(options.maxDepth),
			new KeyNameGuard(),
			new ContentScanner(),
			new SizeLimiter({
				...(options.maxStringLength !== undefined && { maxStringLength: options.maxStringLength }),
				...(options.maxListLength !== undefined && { maxListLength: options.maxListLength }),
			}),
		]);
	}

	get checkNames(): string[] {
		return this.checks.map((check) => check.name);
	}

	validate(payload: unknown): void {
		this.walk({ value: payload, depth: 0, path: '$' });
	}

	private walk(node: PayloadNode): void {
		for (const check of this.checks) {
			check.onNode?.(node);
		}

		const { value } = node;

		if (typeof value === 'string') {
			for (const check of this.checks) {
				check.onString?.(value, node);
			}
			return;
		}

		if (Array.isArray(value)) {
			for (const check of this.checks) {
				check.onList?.(value, node);
			}
			value.forEach((item, index) => {
				this.walk({ value: item, depth: node.depth + 1, path: `${node.path}[${index}]` });
			});
			return;
		}

		const entries = this.entriesOf(value);
		if (entries) {
			for (const [key, child] of entries) {
				for (const check of this.checks) {
					check.onKey?.(key, node);
				}
				this.walk({ value: child, depth: node.depth + 1, path: `${node.path}.${String(key)}` });
			}
		}
	}

	private entriesOf(value: unknown): Array<[unknown, unknown]> | null {
		if (value instanceof Map) {
			return Array.from(value.entries());
		}
		if (typeof value === 'object' && value !== null) {
			return Object.entries(value);
		}
		return null;
	}
}
