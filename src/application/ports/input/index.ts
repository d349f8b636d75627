/**
 * Input Ports (Driving Ports / Use Case Interfaces) Barrel Export
 */
export type { SubmitScanPort, SubmitScanCommand } from './submit-scan.port';
export type { StreamJobEventsPort, StreamJobEventsCommand } from './stream-job-events.port';
export type { ResolveResultsPort, ResolveResultsCommand } from './resolve-results.port';
export type { CleanupJobPort, CleanupJobCommand, CleanupOutcome } from './cleanup-job.port';
export type { RunScanJobPort, RunScanJobCommand } from './run-scan-job.port';
