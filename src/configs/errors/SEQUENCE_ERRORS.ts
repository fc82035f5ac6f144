export const SEQUENCE_ERRORS = {
  INVALID_ARGUMENT: {
    CODE: 'INVALID_ARGUMENT',
    TITLE: 'Invalid Argument',
    MESSAGE: 'The counter request was rejected before reaching the store',
  },
  COUNTER_MISSING: {
    CODE: 'COUNTER_MISSING',
    TITLE: 'Counter Missing',
    MESSAGE: 'No counter record matched the increment',
  },
  STORE_UNAVAILABLE: {
    CODE: 'STORE_UNAVAILABLE',
    TITLE: 'Store Unavailable',
    MESSAGE: 'The counter store failed to complete the operation',
  },
} as const;

export type SequenceErrorCode = keyof typeof SEQUENCE_ERRORS;
