export { DownstreamError, isDownstreamError, asDownstreamError } from './downstream.error';
export type { DownstreamErrorKind } from './downstream.error';
export { StepTimeoutError } from './step-timeout.error';
export { DataIntegrityError } from './data-integrity.error';
export { ResumeTokenInvalidError } from './resume-token.error';
export { AuditWriteError } from './audit-write.error';
export { DuplicateSkuError } from './duplicate-sku.error';
