export enum ResourceKind {
	Compute = 'compute',
	Model = 'model',
	Backend = 'backend',
}
