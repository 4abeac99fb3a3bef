import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNumber, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class GenerationParamsDto {
	@ApiPropertyOptional({ example: 'TinyLlama/TinyLlama-1.1B-Chat-v1.0' })
	@IsOptional()
	@IsString()
	@MaxLength(200)
	model?: string;

	@ApiPropertyOptional({ default: 1024, minimum: 1, maximum: 4096 })
	@IsOptional()
	@IsInt({ message: 'max_tokens must be an integer between 1 and 4096' })
	@Min(1, { message: 'max_tokens must be between 1 and 4096' })
	@Max(4096, { message: 'max_tokens must be between 1 and 4096' })
	max_tokens?: number;

	@ApiPropertyOptional({ default: 0.7, minimum: 0, maximum: 2 })
	@IsOptional()
	@IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'temperature must be a number between 0.0 and 2.0' })
	@Min(0, { message: 'temperature must be between 0.0 and 2.0' })
	@Max(2, { message: 'temperature must be between 0.0 and 2.0' })
	temperature?: number;
}
