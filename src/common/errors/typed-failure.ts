import { ResourceKind } from '../../types/resource-kind.type';

export type FailureKind =
	| 'validation'
	| 'security'
	| 'resource'
	| 'malformed_request'
	| 'authentication'
	| 'unhandled';

/**
 * Base class for every failure a pipeline stage or handler may raise.
 * Instances are frozen once constructed.
 */
export abstract class TypedFailure extends Error {
	abstract readonly kind: FailureKind;

	protected constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class ValidationFailure extends TypedFailure {
	readonly kind = 'validation' as const;

	constructor(
		message: string,
		readonly field?: string,
	) {
		super(message);
		Object.freeze(this);
	}
}

export class SecurityFailure extends TypedFailure {
	readonly kind = 'security' as const;

	constructor(
		message: string,
		readonly code: string = 'SECURITY_ERROR',
	) {
		super(message);
		Object.freeze(this);
	}
}

export class ResourceFailure extends TypedFailure {
	readonly kind = 'resource' as const;

	constructor(
		message: string,
		readonly resourceKind: ResourceKind | string = ResourceKind.Compute,
	) {
		super(message);
		Object.freeze(this);
	}
}

/** The body could not be parsed into the expected shape. */
export class MalformedRequestFailure extends TypedFailure {
	readonly kind = 'malformed_request' as const;

	constructor(message: string) {
		super(message);
		Object.freeze(this);
	}
}

/**
 * Raised by the API-key format stub. It only checks the header's shape;
 * no credential is verified.
 */
export class AuthenticationFailure extends TypedFailure {
	readonly kind = 'authentication' as const;

	constructor(message: string) {
		super(message);
		Object.freeze(this);
	}
}

export class UnhandledFailure extends TypedFailure {
	readonly kind = 'unhandled' as const;

	constructor(
		message: string,
		readonly cause?: unknown,
	) {
		super(message);
		Object.freeze(this);
	}
}

export type AnyTypedFailure =
	| ValidationFailure
	| SecurityFailure
	| ResourceFailure
	| MalformedRequestFailure
	| AuthenticationFailure
	| UnhandledFailure;

export function isTypedFailure(error: unknown): error is AnyTypedFailure {
	return error instanceof TypedFailure;
}

export function toTypedFailure(error: unknown): AnyTypedFailure {
	if (isTypedFailure(error)) {
		return error;
	}
	if (error instanceof Error) {
		return new UnhandledFailure(error.message, error);
	}
	return new UnhandledFailure(String(error), error);
}
