/**
 * In-Memory Counter Store
 *
 * Map-based store for tests and prototypes. Each operation yields to the
 * event loop once, like a network round trip, then reads and writes the Map
 * synchronously, so no other operation can interleave inside it.
 */

import {
  INT64_MAX,
  INT64_MIN,
  type CounterField,
  type CounterFields,
  type CounterRecord,
} from '../counters.model';
import type { CounterStore } from '../counters.store';

const roundTrip = () => new Promise<void>((resolve) => setImmediate(resolve));

export class InMemoryCounterStore implements CounterStore {
  private collections: Map<string, Map<string, CounterFields>> = new Map();

  private collection(name: string): Map<string, CounterFields> {
    let records = this.collections.get(name);
    if (!records) {
      records = new Map();
      this.collections.set(name, records);
    }
    return records;
  }

  async findOne(
    collectionName: string,
    key: string
  ): Promise<CounterRecord | null> {
    await roundTrip();
    const fields = this.collection(collectionName).get(key);
    return fields ? { name: key, ...fields } : null;
  }

  async upsert(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<void> {
    await roundTrip();
    this.collection(collectionName).set(key, { ...fields });
  }

  async insertIfAbsent(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<boolean> {
    await roundTrip();
    const records = this.collection(collectionName);
    if (records.has(key)) return false;
    records.set(key, { ...fields });
    return true;
  }

  async atomicIncrement(
    collectionName: string,
    key: string,
    field: CounterField,
    amount: bigint
  ): Promise<CounterRecord | null> {
    await roundTrip();
    const records = this.collection(collectionName);
    const current = records.get(key);
    if (!current) return null;
    const next = current[field] + amount;
    if (next > INT64_MAX || next < INT64_MIN) {
      throw new RangeError(`$inc would overflow ${field} on ${key}`);
    }
    const updated = { ...current, [field]: next };
    records.set(key, updated);
    return { name: key, ...updated };
  }

  /** Removes a record, as an external process might. */
  async delete(collectionName: string, key: string): Promise<boolean> {
    await roundTrip();
    return this.collection(collectionName).delete(key);
  }
}
