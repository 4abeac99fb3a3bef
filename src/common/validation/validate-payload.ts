import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { JsonObject } from '../../types/json-value.type';
import { ValidationFailure } from '../errors/typed-failure';

interface Violation {
	field: string;
	message: string;
}

function childPath(parent: string | undefined, property: string): string {
	if (parent === undefined) {
		return property;
	}
	return /^\d+$/.test(property) ? `${parent}[${property}]` : `${parent}.${property}`;
}

export function firstViolation(errors: ValidationError[], parent?: string): Violation | undefined {
	for (const error of errors) {
		const field = childPath(parent, error.property);
		const [message] = Object.values(error.constraints ?? {});
		if (message !== undefined) {
			return { field, message };
		}
		const nested = firstViolation(error.children ?? [], field);
		if (nested) {
			return nested;
		}
	}
	return undefined;
}

/**
 * Builds a DTO from an already security-cleared payload and checks its
 * decorators. The first violation becomes a ValidationFailure naming the
 * offending field.
 */
export async function validatePayload<T extends object>(
	dtoClass: ClassConstructor<T>,
	payload: JsonObject,
): Promise<T> {
	const dto = plainToInstance(dtoClass, payload);
	const errors = await validate(dto);

	const violation = firstViolation(errors);
	if (violation) {
		throw new ValidationFailure(violation.message, violation.field);
	}
	return dto;
}
