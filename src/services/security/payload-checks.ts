import { SecurityFailure } from '../../common/errors/typed-failure';
import {
	DANGEROUS_PATTERNS,
	RESERVED_KEY_NAMES,
	RESERVED_KEY_PREFIX,
} from './dangerous-patterns';

export interface PayloadNode {
	value: unknown;
	depth: number;
	path: string;
}

/**
 * One capability of the security scan. The validator walks the payload once
 * and offers every node to each check; a check rejects by throwing
 * SecurityFailure.
 */
export interface PayloadCheck {
	readonly name: string;
	onNode?(node: PayloadNode): void;
	onString?(value: string, node: PayloadNode): void;
	onList?(items: readonly unknown[], node: PayloadNode): void;
	onKey?(key: unknown, node: PayloadNode): void;
}

export class DepthLimiter implements PayloadCheck {
	readonly name = 'depth-limiter';

	constructor(private readonly maxDepth = 10) {}

	onNode(node: PayloadNode): void {
		if (node.depth > this.maxDepth) {
			throw new SecurityFailure(
				`Input structure too deep at ${node.path} (max depth ${this.maxDepth})`,
				'MAX_DEPTH_EXCEEDED',
			);
		}
	}
}

export class ContentScanner implements PayloadCheck {
	readonly name = 'content-scanner';
	private readonly patterns: string[];

	constructor(patterns: readonly string[] = DANGEROUS_PATTERNS) {
		this.patterns = patterns.map((pattern) => pattern.toLowerCase());
	}

	onString(value: string, node: PayloadNode): void {
		const haystack = value.toLowerCase();
		const match = this.patterns.find((pattern) => haystack.includes(pattern));
		if (match !== undefined) {
			throw new SecurityFailure(
				`Dangerous pattern detected: ${match} at ${node.path}`,
				'DANGEROUS_PATTERN',
			);
		}
	}
}

function codePointCount(value: string): number {
	let count = 0;
	for (const _ of value) {
		count++;
	}
	return count;
}

export interface SizeLimits {
	maxStringLength: number;
	maxListLength: number;
}

export class SizeLimiter implements PayloadCheck {
	readonly name = 'size-limiter';
	private readonly limits: SizeLimits;

	constructor(limits: Partial<SizeLimits> = {}) {
		this.limits = { maxStringLength: 10_000, maxListLength: 1_000, ...limits };
	}

	onString(value: string, node: PayloadNode): void {
		// UTF-16 length is an upper bound on the code point count.
		if (value.length <= this.limits.maxStringLength) {
			return;
		}
		const characters = codePointCount(value);
		if (characters > this.limits.maxStringLength) {
			throw new SecurityFailure(
				`Input string too long at ${node.path} (${characters} characters)`,
				'STRING_TOO_LONG',
			);
		}
	}

	onList(items: readonly unknown[], node: PayloadNode): void {
		if (items.length > this.limits.maxListLength) {
			throw new SecurityFailure(
				`Array too large at ${node.path} (${items.length} items)`,
				'ARRAY_TOO_LARGE',
			);
		}
	}
}

export class KeyNameGuard implements PayloadCheck {
	readonly name = 'key-name-guard';

	onKey(key: unknown, node: PayloadNode): void {
		if (typeof key !== 'string') {
			throw new SecurityFailure(`Mapping keys must be strings at ${node.path}`, 'INVALID_KEY');
		}
		if (key.startsWith(RESERVED_KEY_PREFIX) || RESERVED_KEY_NAMES.has(key)) {
			throw new SecurityFailure(`Dangerous key name: ${key} at ${node.path}`, 'DANGEROUS_KEY');
		}
	}
}
