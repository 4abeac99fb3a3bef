import { Global, Module } from '@nestjs/common';
import { ErrorTaxonomy } from '../common/errors/error-taxonomy';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { RateWindowStoreProvider } from '../config/rate-window-store.provider';
import { ADMISSION_CONFIG, AdmissionConfig } from '../types/admission.type';
import {
	AdmissionStage,
	ApiKeyStage,
	ErrorBoundaryStage,
	PayloadShapeStage,
	RateLimitStage,
	RequestLoggingStage,
	SecurityStage,
} from './pipeline/pipeline-stages';
import { RequestPipeline } from './pipeline/request-pipeline.service';
import { RateLimiterService } from './rate-limit/rate-limiter.service';
import { ResourceAdmissionService } from './resource-admission.service';
import { SecurityValidator } from './security/security-validator.service';

@Global()
@Module({
	providers: [
		ErrorTaxonomy,
		RateWindowStoreProvider,
		RateLimiterService,
		{
			provide: ADMISSION_CONFIG,
			inject: [APP_CONFIG],
			useFactory: (config: AppConfig): AdmissionConfig => ({
				maxConcurrent: config.maxConcurrentRequests,
			}),
		},
		ResourceAdmissionService,
		{
			provide: SecurityValidator,
			inject: [APP_CONFIG],
			useFactory: (config: AppConfig) =>
				SecurityValidator.withDefaults({ maxDepth: config.securityMaxDepth }),
		},
		RequestLoggingStage,
		ErrorBoundaryStage,
		RateLimitStage,
		ApiKeyStage,
		PayloadShapeStage,
		SecurityStage,
		AdmissionStage,
		RequestPipeline,
	],
	exports: [
		ErrorTaxonomy,
		RateLimiterService,
		ResourceAdmissionService,
		SecurityValidator,
		RequestPipeline,
	],
})
export class ServicesModule {}
