import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { InferenceBackendProvider } from './backends/inference-backend.provider';
import { InferenceController } from './inference.controller';
import { InferenceService } from './inference.service';
import { buildOperationPolicies, OPERATION_POLICIES } from './operation-policies';

@Module({
	controllers: [InferenceController],
	providers: [
		InferenceBackendProvider,
		InferenceService,
		{
			provide: OPERATION_POLICIES,
			inject: [APP_CONFIG],
			useFactory: (config: AppConfig) => buildOperationPolicies(config),
		},
	],
	exports: [InferenceService],
})
export class InferenceModule {}
