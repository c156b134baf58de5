/**
 * API Client - Public exports
 */

export {
  DocumentRequestClient,
  createApiClient,
  classifyResponse,
  buildSubmissionBody,
  PDF_CONTENT_TYPE,
  TRANSPORT_MESSAGES,
} from './client';
export { EventSourceProgressSource } from './progress';

export type { ApiClientConfig, SubmissionTransport } from './client';
export type { EventSourceLike, EventSourceProgressOptions } from './progress';
