export const ERROR_CODES = {
  CONFIG_INVALID: 'LEMMA_CONFIG_INVALID',
  SHAPE_MISMATCH: 'LEMMA_SHAPE_MISMATCH',
  INVARIANT_VIOLATED: 'LEMMA_INVARIANT_VIOLATED',
  ABORTED: 'LEMMA_ABORTED',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export class LemmaError extends Error {
  constructor(public readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Rejected options, raised before the Scorer is ever called. */
export class ConfigurationError extends LemmaError {
  constructor(message: string) {
    super(ERROR_CODES.CONFIG_INVALID, message);
  }
}

/** Caller passed tensors that disagree on batch size or dims. */
export class ShapeError extends LemmaError {
  constructor(message: string) {
    super(ERROR_CODES.SHAPE_MISMATCH, message);
  }
}

export class InvariantError extends LemmaError {
  constructor(message: string) {
    super(ERROR_CODES.INVARIANT_VIOLATED, message);
  }
}

export class AbortError extends LemmaError {
  constructor(message = 'Aborted') {
    super(ERROR_CODES.ABORTED, message);
  }
}
