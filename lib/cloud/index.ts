/**
 * Cloud drive access: transport, classification and guarded operations.
 */

export type { RemoteBackupTransport } from './transport';
export { FileDriveTransport } from './file-drive-transport';
export {
  CloudDriveService,
  type CloudDriveServiceOptions,
} from './cloud-drive-service';
export {
  classifyError,
  createClassifiedError,
  defaultErrorClassifier,
  describeRawError,
  type ErrorClassifier,
} from './error-classifier';
export {
  checkEstimatedSize,
  checkFileName,
  checkPayload,
  isValidFileName,
} from './backup-guard';
