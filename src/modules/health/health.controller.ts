import { Controller, Get, Inject } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { RequestPipeline } from '../../services/pipeline/request-pipeline.service';
import { ResourceAdmissionService } from '../../services/resource-admission.service';
import { AdmissionStatus } from '../../types/admission.type';
import { InferenceService } from '../inference/inference.service';

export interface HealthReport extends AdmissionStatus {
	status: 'healthy' | 'degraded' | 'busy';
	issues: string[];
	timestamp: number;
	model_loaded: boolean;
	model_type: string;
	model_size: string;
	backend: string;
	pipeline: string[];
}

@ApiTags('health')
@Controller('health')
export class HealthController {
	constructor(
		private readonly admission: ResourceAdmissionService,
		private readonly inferenceService: InferenceService,
		private readonly pipeline: RequestPipeline,
		@Inject(APP_CONFIG) private readonly config: AppConfig,
	) {}

	/**
	 * Read-only snapshot; never touches the admission counter.
	 */
	@Get()
	@ApiOperation({ summary: 'Service health and capacity' })
	check(): HealthReport {
		const capacity = this.admission.getStatus();
		const modelLoaded = this.inferenceService.isBackendReady();

		const issues: string[] = [];
		let status: HealthReport['status'] = 'healthy';
		if (!modelLoaded) {
			status = 'degraded';
			issues.push('Model not loaded');
		}
		if (capacity.active_requests >= capacity.max_concurrent) {
			status = 'busy';
			issues.push('At capacity');
		}

		return {
			...capacity,
			status,
			issues,
			timestamp: Math.floor(Date.now() / 1000),
			model_loaded: modelLoaded,
			model_type: this.config.model.type,
			model_size: this.config.model.size,
			backend: this.inferenceService.backendKind,
			pipeline: this.pipeline.getStatus().stages,
		};
	}
}
