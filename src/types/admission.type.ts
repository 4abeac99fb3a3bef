export interface AdmissionConfig {
	maxConcurrent: number;
}

export interface AdmissionToken {
	readonly resourceKind: string;
	readonly acquiredAt: number;
	/** Returns the capacity unit. Calls after the first are no-ops. */
	release(): void;
}

export interface AdmissionStatus {
	active_requests: number;
	max_concurrent: number;
	utilization: string;
	state: 'HEALTHY' | 'SATURATED';
	cpu_usage_percent: number;
	gpu_available: boolean;
}

export const ADMISSION_CONFIG = Symbol('ADMISSION_CONFIG');
