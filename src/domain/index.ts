/**
 * Domain Layer Barrel Export
 *
 * The domain layer is the core of the client and has no framework dependencies.
 */

// Entities
export { ScanJobEntity, type ScanJobEntityData } from './entities/scan-job.entity';

// Value Objects
export { BookResult, EnrichmentStatus } from './value-objects/book-result.vo';
export { JobHandle } from './value-objects/job-handle.vo';
export { type ProblemDetails } from './value-objects/problem-details.vo';
export { RetryStateVO, type RetryStateProps } from './value-objects/retry-state.vo';
export { ScanJobStatusVO, ScanJobStatus } from './value-objects/scan-job-status.vo';

// Errors
export * from './errors/scan-client.errors';

// Events
export * from './events';
