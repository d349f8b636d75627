/**
 * Output Ports (Driven Ports) Barrel Export
 * These are interfaces that the infrastructure layer must implement
 */
export {
  SCAN_API_PORT,
  type ScanApiPort,
  type ApiHeaders,
  type ApiResponse,
  type EventStreamConnection,
  type UploadScanRequest,
  type JobRequest,
} from './scan-api.port';
export { DELAY_PORT, type DelayPort } from './delay.port';
