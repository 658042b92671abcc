/**
 * errcode/http entry point
 *
 * HTTP status tagging and translation.
 */
export {
  type HttpStatusCarrier,
  isHttpStatusCarrier,
  HttpError,
  withHttpStatus,
  isHttpError,
  fromHttpStatus,
  httpErrorCode,
  httpErrorCoder,
} from "./http";
