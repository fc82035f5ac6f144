import { z } from 'zod';
import defaultLogger, { type Logger } from '@/configs/logger';
import {
  CounterMissingError,
  InvalidArgumentError,
  SequenceError,
  StoreUnavailableError,
} from '@/configs/errors';
import {
  counterNameSchema,
  counterOptionsSchema,
  initialValueSchema,
} from './counters.model';
import type { CounterStore } from './counters.store';

export interface SequenceCounterOptions {
  store: CounterStore;
  /** Added to the counter on every generated id (default 1). */
  step?: bigint | number;
  /** Collection holding the counter records (default `collection.ids`). */
  collectionName?: string;
  /** Value a counter is created with on first use (default 1). */
  initialValue?: bigint | number;
  logger?: Logger;
}

function parseName(name: unknown): string {
  const parsed = counterNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      parsed.error.issues[0]?.message ?? 'Invalid counter name',
      { name }
    );
  }
  return parsed.data;
}

/**
 * Auto-increment ids for stores without a native sequence.
 *
 * Each named counter is one record in `collectionName`. `generateId` creates
 * the record on first use, then advances it with the store's atomic
 * increment and returns the new value. Nothing is cached in process: the
 * store's increment result is the only source of truth, so any number of
 * instances across processes can share a counter.
 *
 * @example
 * const counter = new SequenceCounter({ store: new MongooseCounterStore() });
 * const id = await counter.generateId('orders'); // 2n on a fresh counter
 */
export class SequenceCounter {
  readonly step: bigint;
  readonly collectionName: string;
  readonly initialValue: bigint;
  private readonly store: CounterStore;
  private readonly logger: Logger;

  constructor(options: SequenceCounterOptions) {
    if (!options?.store) {
      throw new InvalidArgumentError('A counter store is required');
    }

    const parsed = counterOptionsSchema.safeParse({
      step: options.step,
      collectionName: options.collectionName,
      initialValue: options.initialValue,
    });
    if (!parsed.success) {
      throw new InvalidArgumentError(
        'Invalid sequence counter options',
        z.flattenError(parsed.error).fieldErrors
      );
    }

    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
    this.step = parsed.data.step;
    this.collectionName = parsed.data.collectionName;
    this.initialValue = parsed.data.initialValue;
  }

  /**
   * Advance the counter by `step` and return the new value, creating the
   * counter with `initialValue` first if it does not exist yet.
   */
  async generateId(name: string): Promise<bigint> {
    const counter = parseName(name);

    return this.withStore(counter, 'generate id', async () => {
      const existing = await this.store.findOne(this.collectionName, counter);
      if (!existing) {
        const created = await this.store.insertIfAbsent(
          this.collectionName,
          counter,
          { value: this.initialValue }
        );
        if (created) {
          this.logger.info(`Counter created at ${this.initialValue}`, {
            counter,
          });
        }
      }

      const record = await this.store.atomicIncrement(
        this.collectionName,
        counter,
        'value',
        this.step
      );
      if (!record) throw new CounterMissingError(counter);

      this.logger.debug(`Issued id ${record.value}`, { counter });
      return record.value;
    });
  }

  /**
   * Overwrite the counter with `initialValue`, creating it if needed.
   * The next `generateId` returns `initialValue + step`, even if that value
   * was issued before.
   */
  async setInitialValue(
    name: string,
    initialValue: bigint | number
  ): Promise<void> {
    const counter = parseName(name);
    const parsed = initialValueSchema.safeParse(initialValue);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        parsed.error.issues[0]?.message ?? 'Invalid initial value',
        { counter, initialValue: String(initialValue) }
      );
    }

    const value = parsed.data;

    await this.withStore(counter, 'set initial value', () =>
      this.store.upsert(this.collectionName, counter, { value })
    );
    this.logger.info(`Counter set to ${value}`, { counter });
  }

  async exists(name: string): Promise<boolean> {
    const counter = parseName(name);
    const record = await this.withStore(counter, 'check existence', () =>
      this.store.findOne(this.collectionName, counter)
    );
    return record !== null;
  }

  private async withStore<T>(
    counter: string,
    action: string,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      const failure =
        error instanceof SequenceError
          ? error
          : new StoreUnavailableError(
              counter,
              error instanceof Error ? error.message : String(error),
              error
            );
      this.logger.error(`Failed to ${action}: ${failure.message}`, {
        counter,
        code: failure.code,
      });
      throw failure;
    }
  }
}

export default SequenceCounter;
