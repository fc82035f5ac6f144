export {
  createSequenceCounter,
  SequenceCounter,
  MongooseCounterStore,
  InMemoryCounterStore,
  CounterSchema,
  DEFAULT_COLLECTION_NAME,
  INT64_MAX,
  INT64_MIN,
  counterModelFor,
} from '@/modules/counters';
export type {
  CounterDocument,
  CounterField,
  CounterFields,
  CounterOverrides,
  CounterRecord,
  CounterStore,
  SequenceCounterOptions,
} from '@/modules/counters';
export {
  CounterMissingError,
  InvalidArgumentError,
  SequenceError,
  SEQUENCE_ERRORS,
  StoreUnavailableError,
} from '@/configs/errors';
export type {
  SequenceErrorCode,
  SequenceErrorDescriptor,
} from '@/configs/errors';
export { default as getEnv, loadEnv } from '@/configs/env';
export type { Env } from '@/configs/env';
export { default as connectDB, disconnectDB } from '@/configs/db/mongodb';
export { default as logger } from '@/configs/logger';
