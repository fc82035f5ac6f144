import mongoose, { mongo, type Connection } from 'mongoose';
import {
  counterModelFor,
  toCounterRecord,
  type CounterField,
  type CounterFields,
  type CounterRecord,
} from '../counters.model';
import type { CounterStore } from '../counters.store';

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY;
}

/**
 * MongoDB counter store. Values are BSON int64. Increments are
 * single-document `findOneAndUpdate` calls with `$inc`, which the server
 * applies atomically and refuses on overflow.
 */
export class MongooseCounterStore implements CounterStore {
  constructor(private readonly connection: Connection = mongoose.connection) {}

  async findOne(
    collectionName: string,
    key: string
  ): Promise<CounterRecord | null> {
    const doc = await counterModelFor(this.connection, collectionName)
      .findOne({ _id: key })
      .lean()
      .exec();
    return doc ? toCounterRecord(doc) : null;
  }

  async upsert(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<void> {
    await counterModelFor(this.connection, collectionName)
      .replaceOne({ _id: key }, { value: fields.value }, { upsert: true })
      .exec();
  }

  async insertIfAbsent(
    collectionName: string,
    key: string,
    fields: CounterFields
  ): Promise<boolean> {
    try {
      const result = await counterModelFor(this.connection, collectionName)
        .updateOne(
          { _id: key },
          { $setOnInsert: { value: fields.value } },
          { upsert: true }
        )
        .exec();
      return result.upsertedCount > 0;
    } catch (error) {
      // Two racing upserts on a fresh key: the other one created it
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }
  }

  async atomicIncrement(
    collectionName: string,
    key: string,
    field: CounterField,
    amount: bigint
  ): Promise<CounterRecord | null> {
    const doc = await counterModelFor(this.connection, collectionName)
      .findOneAndUpdate(
        { _id: key },
        { $inc: { [field]: amount } },
        { new: true }
      )
      .lean()
      .exec();
    return doc ? toCounterRecord(doc) : null;
  }
}
