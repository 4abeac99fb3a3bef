import { Inject, Injectable, Logger } from '@nestjs/common';
import * as os from 'os';
import { ResourceFailure } from '../common/errors/typed-failure';
import {
	ADMISSION_CONFIG,
	AdmissionConfig,
	AdmissionStatus,
	AdmissionToken,
} from '../types/admission.type';
import { ResourceKind } from '../types/resource-kind.type';

/**
 * Bounded-concurrency gate in front of the inference backend. The counter is
 * only touched synchronously, so compare-and-increment cannot interleave
 * with another request on the event loop.
 */
@Injectable()
export class ResourceAdmissionService {
	private readonly logger = new Logger(ResourceAdmissionService.name);
	private active = 0;

	constructor(@Inject(ADMISSION_CONFIG) private readonly config: AdmissionConfig) {}

	get maxConcurrent(): number {
		return this.config.maxConcurrent;
	}

	get activeRequests(): number {
		return this.active;
	}

	acquire(resourceKind: string = ResourceKind.Compute): AdmissionToken {
		if (this.active >= this.config.maxConcurrent) {
			throw new ResourceFailure('Too many concurrent requests', resourceKind);
		}

		this.active++;
		this.logger.debug(`Admitted (${this.active}/${this.config.maxConcurrent})`);

		let released = false;
		return {
			resourceKind,
			acquiredAt: Date.now(),
			release: () => {
				if (released) {
					return;
				}
				released = true;
				this.active = Math.max(0, this.active - 1);
				this.logger.debug(`Released (${this.active}/${this.config.maxConcurrent})`);
			},
		};
	}

	async execute<T>(task: () => Promise<T>, resourceKind: string = ResourceKind.Compute): Promise<T> {
		const token = this.acquire(resourceKind);

		try {
			return await task();
		} finally {
			token.release();
		}
	}

	getStatus(): AdmissionStatus {
		const active = this.active;
		const max = this.config.maxConcurrent;

		return {
			active_requests: active,
			max_concurrent: max,
			utilization: (max > 0 ? (active / max) * 100 : 100).toFixed(2) + '%',
			state: active >= max ? 'SATURATED' : 'HEALTHY',
			cpu_usage_percent: this.cpuUsagePercent(),
			gpu_available: false,
		};
	}

	private cpuUsagePercent(): number {
		const cores = os.cpus().length || 1;
		const [oneMinute = 0] = os.loadavg();
		return Math.min(100, Math.round((oneMinute / cores) * 10_000) / 100);
	}
}
