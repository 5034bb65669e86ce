import { errorCode, errorMessage } from '../../utils/error-utils.js';

export interface HttpErrorPayload {
  status: number;
  body: {
    error: {
      message: string;
      code: string;
    };
  };
}

function extractStatus(err: unknown): number | undefined {
  if (!err || typeof err !== 'object') {
    return undefined;
  }
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

export function mapErrorToHttp(err: unknown): HttpErrorPayload {
  const status = extractStatus(err);
  const message = errorMessage(err) || 'Internal server error';
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return { status, body: { error: { message, code: errorCode(err) ?? 'bad_request' } } };
  }
  return {
    status: 500,
    body: { error: { message, code: errorCode(err) ?? 'internal_error' } }
  };
}
