import mongoose, { type Connection } from 'mongoose';
import getEnv from '@/configs/env';
import { SequenceCounter, type SequenceCounterOptions } from './counters.services';
import { MongooseCounterStore } from './stores/mongoose.store';

export type CounterOverrides = Omit<SequenceCounterOptions, 'store'>;

/**
 * Sequence counter over MongoDB, configured from the environment.
 * The connection stays owned by the caller.
 */
export function createSequenceCounter(
  connection: Connection = mongoose.connection,
  overrides: CounterOverrides = {}
): SequenceCounter {
  const env = getEnv();

  return new SequenceCounter({
    store: new MongooseCounterStore(connection),
    step: overrides.step ?? env.SEQUENCE_STEP,
    collectionName: overrides.collectionName ?? env.SEQUENCE_COLLECTION,
    initialValue: overrides.initialValue ?? env.SEQUENCE_INITIAL_VALUE,
    logger: overrides.logger,
  });
}

export { SequenceCounter, MongooseCounterStore };
export type { SequenceCounterOptions };
export type { CounterStore } from './counters.store';
export { InMemoryCounterStore } from './stores/memory.store';
export {
  CounterSchema,
  DEFAULT_COLLECTION_NAME,
  INT64_MAX,
  INT64_MIN,
  counterModelFor,
  type CounterDocument,
  type CounterField,
  type CounterFields,
  type CounterRecord,
} from './counters.model';
