export type RelayErrorCode =
  | 'CAPTURE_FAILED'
  | 'BROWSER_CLOSED'
  | 'INPUT_DISPATCH_FAILED'
  | 'MALFORMED_OFFER'
  | 'MALFORMED_CANDIDATE'
  | 'ANSWER_GENERATION_FAILED'
  | 'SESSION_NOT_FOUND'
  | 'FRAME_LOOP_BUSY';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Transient: the next loop tick retries. */
export class CaptureError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CAPTURE_FAILED', message, options);
  }
}

/** The tab or its browser is gone; nothing issued against it can succeed again. */
export class BrowserClosedError extends RelayError {
  constructor(message = 'Browser session is closed', options?: { cause?: unknown }) {
    super('BROWSER_CLOSED', message, options);
  }
}

export class InputDispatchError extends RelayError {
  readonly action: string;

  constructor(action: string, options?: { cause?: unknown }) {
    super('INPUT_DISPATCH_FAILED', `Failed to dispatch ${action}: ${describeError(options?.cause)}`, options);
    this.action = action;
  }
}

export class MalformedOfferError extends RelayError {
  constructor(message: string) {
    super('MALFORMED_OFFER', message);
  }
}

export class MalformedCandidateError extends RelayError {
  constructor(message: string) {
    super('MALFORMED_CANDIDATE', message);
  }
}

export class AnswerGenerationError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANSWER_GENERATION_FAILED', message, options);
  }
}

export class SessionNotFoundError extends RelayError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
  }
}

export class FrameLoopBusyError extends RelayError {
  constructor(sessionId: string) {
    super('FRAME_LOOP_BUSY', `Session ${sessionId} already has a frame consumer`);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
}
