import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
	IsOptional,
	IsString,
	Validate,
	ValidatorConstraint,
	ValidatorConstraintInterface,
} from 'class-validator';

@ValidatorConstraint({ name: 'embeddingInput', async: false })
export class EmbeddingInputConstraint implements ValidatorConstraintInterface {
	validate(value: unknown): boolean {
		if (typeof value === 'string') {
			return value.length > 0;
		}
		return (
			Array.isArray(value) &&
			value.length > 0 &&
			value.every((item) => typeof item === 'string' && item.length > 0)
		);
	}

	defaultMessage(): string {
		return 'input must be a non-empty string or a non-empty array of strings';
	}
}

export class EmbeddingDto {
	@ApiProperty({
		oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
		example: ['first text', 'second text'],
	})
	@Validate(EmbeddingInputConstraint)
	input!: string | string[];

	@ApiPropertyOptional({ example: 'sentence-transformers/all-MiniLM-L6-v2' })
	@IsOptional()
	@IsString()
	model?: string;
}
