/**
 * MongooseCounterStore Unit Tests
 *
 * Models run on a connection that is never opened; query methods are stubbed
 * so the tests assert the MongoDB operations the store issues.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import mongoose, { mongo, type Connection, type Model } from 'mongoose';
import { counterModelFor, type CounterDocument } from '../counters.model';
import { MongooseCounterStore } from './mongoose.store';

// =============================================================================
// Helpers
// =============================================================================

/** Chainable stand-in for a mongoose Query resolving to `result`. */
function fakeQuery<T>(result: T) {
  const query = {
    lean: vi.fn(() => query),
    exec: vi.fn(() => Promise.resolve(result)),
  };
  return query as never;
}

function failingQuery(error: Error) {
  return {
    exec: vi.fn(() => Promise.reject(error)),
  } as never;
}

// =============================================================================
// Tests
// =============================================================================

describe('MongooseCounterStore', () => {
  let connection: Connection;
  let model: Model<CounterDocument>;
  let store: MongooseCounterStore;

  beforeEach(() => {
    connection = mongoose.createConnection();
    model = counterModelFor(connection, 'collection.ids');
    store = new MongooseCounterStore(connection);
  });

  it('registers one model per collection', () => {
    expect(counterModelFor(connection, 'collection.ids')).toBe(model);
    expect(model.collection.collectionName).toBe('collection.ids');

    const other = counterModelFor(connection, 'other.ids');
    expect(other).not.toBe(model);
    expect(other.collection.collectionName).toBe('other.ids');
  });

  it('maps a found document to a counter record', async () => {
    const findOne = vi
      .spyOn(model, 'findOne')
      .mockReturnValue(fakeQuery({ _id: 'orders', value: 4n }));

    expect(await store.findOne('collection.ids', 'orders')).toEqual({
      name: 'orders',
      value: 4n,
    });
    expect(findOne).toHaveBeenCalledWith({ _id: 'orders' });
  });

  it('reads int64 values returned as Long', async () => {
    vi.spyOn(model, 'findOne').mockReturnValue(
      fakeQuery({ _id: 'orders', value: mongo.Long.fromBigInt(2n ** 60n) })
    );

    expect(await store.findOne('collection.ids', 'orders')).toEqual({
      name: 'orders',
      value: 2n ** 60n,
    });
  });

  it('reads promoted and legacy number values', async () => {
    vi.spyOn(model, 'findOne').mockReturnValue(
      fakeQuery({ _id: 'orders', value: 42 })
    );

    expect(await store.findOne('collection.ids', 'orders')).toEqual({
      name: 'orders',
      value: 42n,
    });
  });

  it('rejects a malformed stored value', async () => {
    vi.spyOn(model, 'findOne').mockReturnValue(
      fakeQuery({ _id: 'orders', value: 1.5 })
    );

    await expect(store.findOne('collection.ids', 'orders')).rejects.toThrow(
      'malformed counter value 1.5'
    );
  });

  it('returns null when no document matches', async () => {
    vi.spyOn(model, 'findOne').mockReturnValue(fakeQuery(null));

    expect(await store.findOne('collection.ids', 'orders')).toBeNull();
  });

  it('replaces the whole document on upsert', async () => {
    const replaceOne = vi
      .spyOn(model, 'replaceOne')
      .mockReturnValue(fakeQuery({ acknowledged: true }));

    await store.upsert('collection.ids', 'orders', { value: 100n });

    expect(replaceOne).toHaveBeenCalledWith(
      { _id: 'orders' },
      { value: 100n },
      { upsert: true }
    );
  });

  it('creates missing counters with $setOnInsert', async () => {
    const updateOne = vi
      .spyOn(model, 'updateOne')
      .mockReturnValue(fakeQuery({ upsertedCount: 1 }));

    expect(await store.insertIfAbsent('collection.ids', 'orders', { value: 1n })).toBe(
      true
    );
    expect(updateOne).toHaveBeenCalledWith(
      { _id: 'orders' },
      { $setOnInsert: { value: 1n } },
      { upsert: true }
    );
  });

  it('reports an existing counter as not inserted', async () => {
    vi.spyOn(model, 'updateOne').mockReturnValue(fakeQuery({ upsertedCount: 0 }));

    expect(await store.insertIfAbsent('collection.ids', 'orders', { value: 1n })).toBe(
      false
    );
  });

  it('treats a duplicate key from a racing upsert as not inserted', async () => {
    const duplicate = new mongo.MongoServerError({
      message: 'E11000 duplicate key error',
      code: 11000,
    });
    vi.spyOn(model, 'updateOne').mockReturnValue(failingQuery(duplicate));

    expect(await store.insertIfAbsent('collection.ids', 'orders', { value: 1n })).toBe(
      false
    );
  });

  it('propagates other insert failures', async () => {
    vi.spyOn(model, 'updateOne').mockReturnValue(
      failingQuery(new Error('not primary'))
    );

    await expect(
      store.insertIfAbsent('collection.ids', 'orders', { value: 1n })
    ).rejects.toThrow('not primary');
  });

  it('increments with $inc and returns the new document', async () => {
    const findOneAndUpdate = vi
      .spyOn(model, 'findOneAndUpdate')
      .mockReturnValue(fakeQuery({ _id: 'orders', value: 3n }));

    expect(
      await store.atomicIncrement('collection.ids', 'orders', 'value', 2n)
    ).toEqual({ name: 'orders', value: 3n });
    expect(findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'orders' },
      { $inc: { value: 2n } },
      { new: true }
    );
  });

  it('returns null when incrementing a missing counter', async () => {
    vi.spyOn(model, 'findOneAndUpdate').mockReturnValue(fakeQuery(null));

    expect(
      await store.atomicIncrement('collection.ids', 'orders', 'value', 1n)
    ).toBeNull();
  });
});
