import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
	ArrayMaxSize,
	ArrayNotEmpty,
	IsArray,
	IsIn,
	IsString,
	MaxLength,
	ValidateNested,
} from 'class-validator';
import { ChatRole } from '../backends/inference-backend';
import { GenerationParamsDto } from './generation-params.dto';

export const CHAT_ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

export class ChatMessageDto {
	@ApiProperty({ enum: CHAT_ROLES, example: 'user' })
	@IsIn(CHAT_ROLES, { message: 'role must be one of: system, user, assistant' })
	role!: ChatRole;

	@ApiProperty({ example: 'Hello!', maxLength: 8000 })
	@IsString()
	@MaxLength(8000, { message: 'content must not exceed 8000 characters' })
	content!: string;
}

export class ChatCompletionDto extends GenerationParamsDto {
	@ApiProperty({ type: [ChatMessageDto] })
	@IsArray({ message: 'messages must be a non-empty array' })
	@ArrayNotEmpty({ message: 'messages must be a non-empty array' })
	@ArrayMaxSize(1000)
	@ValidateNested({ each: true })
	@Type(() => ChatMessageDto)
	messages!: ChatMessageDto[];
}
