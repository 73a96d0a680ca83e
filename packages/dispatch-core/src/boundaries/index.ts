export type {
  HttpErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  HttpSuccessBody,
  HttpResponse,
  HttpMappingOptions,
} from "./http.js";
export {
  toHttpResponse,
  createErrorEnvelope,
  DEFAULT_STATUS_BY_KIND,
  UNPROCESSABLE_STATUS,
} from "./http.js";

export type { ConsumerAction, ConsumerDisposition } from "./consumer.js";
export { toConsumerDisposition } from "./consumer.js";
