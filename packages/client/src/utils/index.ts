export {
  decodeEnvelope,
  decodeJson,
  encodeJson,
  isRecord,
  unwrap,
  wrap,
} from './envelope.js';
export type {
  HttpMethod,
  PipelineSettings,
  RequestOptions,
  Requester,
} from './http.js';
export {
  ACCEPTED_STATUSES,
  buildHeaders,
  createKyInstance,
  DEFAULT_HEADERS,
  HttpPipeline,
} from './http.js';
export type { QueryParams, QueryValue } from './query.js';
export { buildQuery, withQuery } from './query.js';
