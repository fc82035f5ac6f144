import { mongo, Schema, type Connection, type Model } from 'mongoose';
import { z } from 'zod';

export const DEFAULT_COLLECTION_NAME = 'collection.ids';

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/** A counter as the rest of the code sees it. */
export interface CounterRecord {
  name: string;
  value: bigint;
}

/** Mutable part of a counter record. */
export type CounterFields = Omit<CounterRecord, 'name'>;
export type CounterField = keyof CounterFields;

/** Persisted shape: the counter name is the document key. */
export interface CounterDocument {
  _id: string;
  value: bigint;
}

// ─── Mongoose schema ────────────────────────────────────────────────────────
export const CounterSchema = new Schema<CounterDocument>(
  {
    _id: { type: String, required: true },
    value: { type: Schema.Types.BigInt, required: true },
  },
  { versionKey: false }
);

/**
 * Counters may live in any collection, so models are registered per
 * collection on the given connection and reused afterwards.
 */
export function counterModelFor(
  connection: Connection,
  collectionName: string
): Model<CounterDocument> {
  const modelName = `counter:${collectionName}`;
  const existing: Model<CounterDocument> | undefined =
    connection.models[modelName];
  return (
    existing ??
    connection.model<CounterDocument>(modelName, CounterSchema, collectionName)
  );
}

/**
 * Raw int64 fields come back as bigint, as a `Long`, or as a number when the
 * driver promotes small longs; legacy double records are read the same way.
 */
export function toCounterValue(raw: unknown): bigint {
  if (typeof raw === 'bigint') return raw;
  if (raw instanceof mongo.Long) return raw.toBigInt();
  if (typeof raw === 'number' && Number.isSafeInteger(raw)) return BigInt(raw);
  throw new Error(`malformed counter value ${String(raw)}`);
}

export function toCounterRecord(doc: {
  _id: string;
  value: unknown;
}): CounterRecord {
  return { name: doc._id, value: toCounterValue(doc.value) };
}

// ─── Zod schemas ────────────────────────────────────────────────────────────
export const counterNameSchema = z
  .string({ error: 'Counter name must be a string' })
  .min(1, 'Counter name must not be empty');

/** Integer inputs: any bigint, or a number that is a safe integer. */
const int64Schema = (label: string) =>
  z
    .union([z.bigint(), z.int()], { error: `${label} must be an integer` })
    .transform((value) => BigInt(value))
    .pipe(
      z
        .bigint()
        .min(INT64_MIN, `${label} is outside the 64-bit integer range`)
        .max(INT64_MAX, `${label} is outside the 64-bit integer range`)
    );

export const initialValueSchema = int64Schema('Initial value').refine(
  (value) => value >= 0n,
  'Initial value must be greater than or equal to 0'
);

export const counterOptionsSchema = z.object({
  step: int64Schema('Step').default(1n),
  collectionName: z
    .string()
    .optional()
    .transform((name) => name || DEFAULT_COLLECTION_NAME),
  initialValue: initialValueSchema.default(1n),
});

export type CounterOptions = z.infer<typeof counterOptionsSchema>;
