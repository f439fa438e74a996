/**
 * Map engine errors to HTTP responses
 */

import { isTranslatorError, toErrorMessage, type ErrorCode } from '../engine/index.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INPUT_PARSE: 400,
  EMPTY_QUERY: 400,
  TRANSLATION_ITEM: 502,
  UNSUPPORTED_FORMAT: 400,
  UNSUPPORTED_LANGUAGE: 400,
  PROVIDER_TIMEOUT: 504,
  CONFIGURATION: 500,
};

export interface ErrorBody {
  error: string;
  code?: ErrorCode;
}

export function toHttpError(error: unknown): { status: number; body: ErrorBody } {
  const message = toErrorMessage(error);

  if (isTranslatorError(error)) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: message, code: error.code },
    };
  }

  return { status: 500, body: { error: message } };
}
