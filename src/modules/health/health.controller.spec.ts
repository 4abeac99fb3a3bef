import { Test, TestingModule } from '@nestjs/testing';
import { createTestConfig } from '../../../test/setup/test-setup';
import { APP_CONFIG } from '../../config/app.config';
import { RequestPipeline } from '../../services/pipeline/request-pipeline.service';
import { ResourceAdmissionService } from '../../services/resource-admission.service';
import { ADMISSION_CONFIG } from '../../types/admission.type';
import { InferenceService } from '../inference/inference.service';
import { HealthController } from './health.controller';

describe('HealthController', () => {
	let controller: HealthController;
	let admission: ResourceAdmissionService;

	const inferenceService = {
		isBackendReady: jest.fn(),
		backendKind: 'echo',
	};

	const pipeline = {
		getStatus: jest.fn().mockReturnValue({ stages: ['request-logging', 'admission'], count: 2, status: 'active' }),
	};

	beforeEach(async () => {
		inferenceService.isBackendReady.mockReturnValue(true);

		const module: TestingModule = await Test.createTestingModule({
			controllers: [HealthController],
			providers: [
				ResourceAdmissionService,
				{ provide: ADMISSION_CONFIG, useValue: { maxConcurrent: 2 } },
				{ provide: InferenceService, useValue: inferenceService },
				{ provide: RequestPipeline, useValue: pipeline },
				{ provide: APP_CONFIG, useValue: createTestConfig() },
			],
		}).compile();

		controller = module.get(HealthController);
		admission = module.get(ResourceAdmissionService);
	});

	it('reports healthy when idle with a loaded model', () => {
		const report = controller.check();

		expect(report).toMatchObject({
			status: 'healthy',
			issues: [],
			active_requests: 0,
			max_concurrent: 2,
			utilization: '0.00%',
			state: 'HEALTHY',
			model_loaded: true,
			model_type: 'chat',
			model_size: 'small',
			backend: 'echo',
			pipeline: ['request-logging', 'admission'],
		});
	});

	it('reports degraded without a model', () => {
		inferenceService.isBackendReady.mockReturnValue(false);

		expect(controller.check()).toMatchObject({ status: 'degraded', issues: ['Model not loaded'], model_loaded: false });
	});

	it('reports busy at capacity without taking a slot', () => {
		admission.acquire();
		admission.acquire();

		const report = controller.check();

		expect(report).toMatchObject({ status: 'busy', issues: ['At capacity'], state: 'SATURATED' });
		expect(admission.activeRequests).toBe(2);
	});
});
