import SequenceError from './SequenceError';
import { SEQUENCE_ERRORS } from './SEQUENCE_ERRORS';

export { SequenceError, SEQUENCE_ERRORS };
export type { SequenceErrorDescriptor } from './SequenceError';
export type { SequenceErrorCode } from './SEQUENCE_ERRORS';

/** Bad caller input, raised before any store call. */
export class InvalidArgumentError extends SequenceError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super({ ...SEQUENCE_ERRORS.INVALID_ARGUMENT, MESSAGE: message, META: meta });
  }
}

/**
 * The atomic increment found no record although the counter was checked or
 * created just before: the record was deleted externally or never persisted.
 */
export class CounterMissingError extends SequenceError {
  readonly counter: string;

  constructor(counter: string) {
    super({
      ...SEQUENCE_ERRORS.COUNTER_MISSING,
      MESSAGE: `Counter "${counter}" does not exist; call setInitialValue("${counter}", value) to initialize it`,
      META: { counter },
    });
    this.counter = counter;
  }
}

export class StoreUnavailableError extends SequenceError {
  readonly counter: string;

  constructor(counter: string, message: string, cause?: unknown) {
    super(
      {
        ...SEQUENCE_ERRORS.STORE_UNAVAILABLE,
        MESSAGE: `Store failure on counter "${counter}": ${message}`,
        META: { counter },
      },
      { cause }
    );
    this.counter = counter;
  }
}
