import { FactoryProvider, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../../../config/app.config';
import { EchoBackend } from './echo.backend';
import { INFERENCE_BACKEND, InferenceBackend } from './inference-backend';
import { UpstreamBackend } from './upstream.backend';

export function createInferenceBackend(config: AppConfig): InferenceBackend {
	if (config.backend.kind === 'upstream') {
		if (!config.backend.baseUrl) {
			throw new Error('UPSTREAM_BASE_URL is required for the upstream backend');
		}
		return new UpstreamBackend({
			baseUrl: config.backend.baseUrl,
			apiKey: config.backend.apiKey,
			timeoutMs: config.backend.timeoutMs,
		});
	}
	return new EchoBackend();
}

export const InferenceBackendProvider: FactoryProvider<InferenceBackend> = {
	provide: INFERENCE_BACKEND,
	inject: [APP_CONFIG],
	useFactory: (config: AppConfig) => {
		const backend = createInferenceBackend(config);
		new Logger('InferenceBackend').log(`Using ${backend.kind} backend`);
		return backend;
	},
};
