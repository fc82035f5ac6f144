import type { SequenceErrorCode } from './SEQUENCE_ERRORS';

export interface SequenceErrorDescriptor {
  CODE: SequenceErrorCode;
  TITLE: string;
  MESSAGE: string;
  META?: Record<string, unknown>;
}

/**
 * Base class of every failure raised by a sequence counter.
 * Carries the same descriptor shape the rest of the codebase logs and serializes.
 */
export default class SequenceError extends Error {
  readonly code: SequenceErrorCode;
  readonly title: string;
  readonly meta: Record<string, unknown>;

  constructor(descriptor: SequenceErrorDescriptor, options?: ErrorOptions) {
    super(descriptor.MESSAGE, options);
    this.name = new.target.name;
    this.code = descriptor.CODE;
    this.title = descriptor.TITLE;
    this.meta = descriptor.META ?? {};
  }

  serializeError(): SequenceErrorDescriptor {
    return {
      CODE: this.code,
      TITLE: this.title,
      MESSAGE: this.message,
      META: this.meta,
    };
  }
}
