import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { GenerationParamsDto } from './generation-params.dto';

export class CompletionDto extends GenerationParamsDto {
	@ApiProperty({ example: 'Once upon a time' })
	@IsString()
	@IsNotEmpty({ message: 'prompt must not be empty' })
	prompt!: string;
}
