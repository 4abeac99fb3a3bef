import { Controller, Get, HttpCode, HttpStatus, Inject, Post, Req, Res } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { sendPipelineResponse, toInboundRequest } from '../../common/http/express-adapter';
import { RequestPipeline } from '../../services/pipeline/request-pipeline.service';
import { ChatCompletionDto } from './dto/chat-completion.dto';
import { CompletionDto } from './dto/completion.dto';
import { EmbeddingDto } from './dto/embedding.dto';
import { InferenceService } from './inference.service';
import { InferenceOperationPolicies, OPERATION_POLICIES } from './operation-policies';

/**
 * POST routes hand the raw request to the pipeline, which owns body reading,
 * every check, and the failure responses.
 */
@ApiTags('inference')
@Controller('v1')
export class InferenceController {
	constructor(
		private readonly pipeline: RequestPipeline,
		private readonly inferenceService: InferenceService,
		@Inject(OPERATION_POLICIES) private readonly policies: InferenceOperationPolicies,
	) {}

	@Post('chat/completions')
	@ApiOperation({ summary: 'Chat completion' })
	@ApiBody({ type: ChatCompletionDto })
	async chatCompletions(@Req() req: Request, @Res() res: Response): Promise<void> {
		const response = await this.pipeline.run(this.policies.chat, toInboundRequest(req), (payload, context) =>
			this.inferenceService.chat(payload, context),
		);
		sendPipelineResponse(res, response);
	}

	@Post('completions')
	@ApiOperation({ summary: 'Text completion' })
	@ApiBody({ type: CompletionDto })
	async completions(@Req() req: Request, @Res() res: Response): Promise<void> {
		const response = await this.pipeline.run(this.policies.completion, toInboundRequest(req), (payload, context) =>
			this.inferenceService.complete(payload, context),
		);
		sendPipelineResponse(res, response);
	}

	@Post('embeddings')
	@ApiOperation({ summary: 'Embeddings' })
	@ApiBody({ type: EmbeddingDto })
	async embeddings(@Req() req: Request, @Res() res: Response): Promise<void> {
		const response = await this.pipeline.run(this.policies.embedding, toInboundRequest(req), (payload, context) =>
			this.inferenceService.embed(payload, context),
		);
		sendPipelineResponse(res, response);
	}

	@Get('models')
	@HttpCode(HttpStatus.OK)
	@ApiOperation({ summary: 'List available models' })
	listModels() {
		return this.inferenceService.listModels();
	}
}
