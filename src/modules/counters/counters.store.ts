import type { CounterField, CounterFields, CounterRecord } from './counters.model';

/**
 * Persistence contract of a sequence counter. Every operation is a point
 * operation on one record, addressed by collection and counter name.
 */
export interface CounterStore {
  findOne(collectionName: string, key: string): Promise<CounterRecord | null>;

  /** Create or replace the record. */
  upsert(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<void>;

  /**
   * Create the record only when none exists, as one atomic operation.
   * Resolves true when this call created it.
   */
  insertIfAbsent(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<boolean>;

  /**
   * Atomically add `amount` to `field` and resolve the updated record,
   * or null when no record exists. Concurrent callers on the same key must
   * each observe their own increment. A result outside the int64 range is
   * rejected without changing the record.
   */
  atomicIncrement(
    collectionName: string,
    key: string,
    field: CounterField,
    amount: bigint
  ): Promise<CounterRecord | null>;
}
