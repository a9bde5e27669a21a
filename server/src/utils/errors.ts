export type SynthesisFailureKind =
  | 'invalid_text'
  | 'empty_response'
  | 'unauthorized'
  | 'voice_not_found'
  | 'invalid_parameters'
  | 'rate_limited'
  | 'upstream_unavailable'
  | 'upstream_error'
  | 'voices_unavailable'
  | 'connection_failed'
  | 'storage_failed';

type SynthesisErrorOptions = {
  responseBody?: unknown;
  cause?: unknown;
};

/**
 * A classified failure of a speech synthesis or voice catalog call.
 * `statusCode` follows HTTP semantics; the boundary maps codes >= 500 to a 500 response.
 */
export class SynthesisError extends Error {
  readonly kind: SynthesisFailureKind;
  readonly statusCode: number;
  readonly responseBody: unknown;

  constructor(kind: SynthesisFailureKind, message: string, statusCode: number, options: SynthesisErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SynthesisError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.responseBody = options.responseBody ?? null;
  }

  toLogObject() {
    return {
      kind: this.kind,
      message: this.message,
      status_code: this.statusCode,
      response_data: this.responseBody,
    };
  }
}

export class AudioStorageError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AudioStorageError';
  }
}
