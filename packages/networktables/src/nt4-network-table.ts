/**
 * NT4 NetworkTables
 * Table interfaces over a live NT4 client connection. Topics are opened on
 * first use; reads return the latest value the server has sent.
 */

import { EventEmitter } from 'eventemitter3';
import { createChildLogger, wrapError } from '@llvision/shared';
import type {
  NetworkTable,
  NetworkTableInstance,
  NetworkTableValue,
  Nt4NetworkTableInstanceConfig,
  TimestampedValue,
  TopicSubscriber,
  ValueChangedEvent,
} from './types.js';
import { copyValue, isBoolean, isNumber, isNumberArray, isString, isStringArray, topicPath } from './values.js';
import type { ValueGuard } from './values.js';

const logger = createChildLogger({ component: 'Nt4NetworkTables' });

const DEFAULT_CONFIG: Nt4NetworkTableInstanceConfig = {
  clock: () => Math.floor(performance.now() * 1000),
  pollStorage: 20,
};

export type Nt4ValueType = 'double' | 'boolean' | 'string' | 'double[]' | 'string[]';

/**
 * One topic on the NT4 connection
 */
export interface Nt4Topic {
  /** Returns the subscription id */
  subscribe(callback: (value: NetworkTableValue | null) => void): number;
  unsubscribe(subscriptionId: number): void;
  /** Announce this client as a publisher of the topic */
  publish(): Promise<void>;
  setValue(value: NetworkTableValue): void;
}

/**
 * The part of an NT4 client the tables use
 */
export interface Nt4Client {
  createTopic(name: string, type: Nt4ValueType): Nt4Topic;
}

export interface Nt4NetworkTableInstanceEvents {
  /** A value arrived from the server */
  valueChanged: (event: ValueChangedEvent) => void;
}

interface TopicEntry {
  readonly path: string;
  readonly table: string;
  readonly key: string;
  readonly type: Nt4ValueType;
  readonly topic: Nt4Topic;
  subscriptionId?: number;
  latest?: TimestampedValue<NetworkTableValue>;
  published?: Promise<void>;
}

export class Nt4NetworkTableInstance
  extends EventEmitter<Nt4NetworkTableInstanceEvents>
  implements NetworkTableInstance
{
  private config: Nt4NetworkTableInstanceConfig;
  private entries: Map<string, TopicEntry> = new Map();
  private tables: Map<string, Nt4NetworkTable> = new Map();

  constructor(
    private readonly client: Nt4Client,
    config: Partial<Nt4NetworkTableInstanceConfig> = {}
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getTable(name: string): Nt4NetworkTable {
    let table = this.tables.get(name);
    if (!table) {
      table = new Nt4NetworkTable(this, name);
      this.tables.set(name, table);
    }
    return table;
  }

  /**
   * The client sends each value as soon as its topic is announced, so there is nothing to push
   */
  flush(): void {
    logger.debug('Flush requested; NT4 writes are already sent');
  }

  now(): number {
    return this.config.clock();
  }

  getPollStorage(): number {
    return this.config.pollStorage;
  }

  /**
   * Latest value the server sent for a key. The first call subscribes and returns undefined.
   */
  read(table: string, key: string, type: Nt4ValueType): TimestampedValue<NetworkTableValue> | undefined {
    const entry = this.open(table, key, type);
    if (entry.subscriptionId === undefined) {
      entry.subscriptionId = entry.topic.subscribe((value) => this.receive(entry, value));
    }
    return entry.latest;
  }

  write(table: string, key: string, type: Nt4ValueType, value: NetworkTableValue): void {
    const entry = this.open(table, key, type);
    if (entry.type !== type) {
      logger.warn({ topic: entry.path, type, topicType: entry.type }, 'Write does not match the topic type, dropped');
      return;
    }

    const stored = copyValue(value);
    entry.latest = { value: copyValue(stored), timestamp: this.now() };

    if (!entry.published) {
      entry.published = entry.topic.publish().catch((error: unknown) => {
        entry.published = undefined;
        throw error;
      });
    }

    void entry.published
      .then(() => entry.topic.setValue(stored))
      .catch((error: unknown) => {
        logger.error({ err: wrapError(error), topic: entry.path }, 'NT4 write failed');
      });
  }

  close(): void {
    for (const entry of this.entries.values()) {
      if (entry.subscriptionId !== undefined) {
        entry.topic.unsubscribe(entry.subscriptionId);
      }
    }
    this.entries.clear();
    this.tables.clear();
    this.removeAllListeners();
  }

  // The topic type is fixed by whichever read or write opens it first
  private open(table: string, key: string, type: Nt4ValueType): TopicEntry {
    const path = topicPath(table, key);
    let entry = this.entries.get(path);
    if (!entry) {
      entry = { path, table, key, type, topic: this.client.createTopic(path, type) };
      this.entries.set(path, entry);
    }
    return entry;
  }

  private receive(entry: TopicEntry, value: NetworkTableValue | null): void {
    if (value === null) return;

    const timestamp = this.now();
    entry.latest = { value: copyValue(value), timestamp };
    this.emit('valueChanged', {
      topic: entry.path,
      table: entry.table,
      key: entry.key,
      value: copyValue(value),
      timestamp,
    });
  }
}

class Nt4TopicSubscriber<T extends NetworkTableValue> implements TopicSubscriber<T> {
  readonly topic: string;
  private queue: TimestampedValue<T>[] = [];
  private closed = false;
  private readonly listener: (event: ValueChangedEvent) => void;

  constructor(
    private readonly instance: Nt4NetworkTableInstance,
    private readonly table: string,
    private readonly key: string,
    private readonly type: Nt4ValueType,
    private readonly guard: ValueGuard<T>,
    private readonly defaultValue: T
  ) {
    this.topic = topicPath(table, key);
    this.listener = (event) => {
      if (event.topic !== this.topic || !this.guard(event.value)) return;
      this.queue.push({ value: copyValue(event.value), timestamp: event.timestamp });

      while (this.queue.length > this.instance.getPollStorage()) {
        this.queue.shift();
      }
    };
    this.instance.on('valueChanged', this.listener);
    this.instance.read(table, key, type);
  }

  readQueue(): TimestampedValue<T>[] {
    const samples = this.queue;
    this.queue = [];
    return samples;
  }

  get(): T {
    const stored = this.instance.read(this.table, this.key, this.type);
    if (stored && this.guard(stored.value)) {
      return copyValue(stored.value);
    }
    return copyValue(this.defaultValue);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.instance.off('valueChanged', this.listener);
  }
}

export class Nt4NetworkTable implements NetworkTable {
  constructor(
    private readonly instance: Nt4NetworkTableInstance,
    readonly name: string
  ) {}

  getInstance(): Nt4NetworkTableInstance {
    return this.instance;
  }

  getNumber(key: string, defaultValue: number): number {
    return this.read(key, 'double', isNumber, defaultValue);
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    return this.read(key, 'boolean', isBoolean, defaultValue);
  }

  getString(key: string, defaultValue: string): string {
    return this.read(key, 'string', isString, defaultValue);
  }

  getNumberArray(key: string, defaultValue: number[]): number[] {
    return this.read(key, 'double[]', isNumberArray, defaultValue);
  }

  getStringArray(key: string, defaultValue: string[]): string[] {
    return this.read(key, 'string[]', isStringArray, defaultValue);
  }

  setNumber(key: string, value: number): void {
    this.instance.write(this.name, key, 'double', value);
  }

  setBoolean(key: string, value: boolean): void {
    this.instance.write(this.name, key, 'boolean', value);
  }

  setString(key: string, value: string): void {
    this.instance.write(this.name, key, 'string', value);
  }

  setNumberArray(key: string, value: readonly number[]): void {
    this.instance.write(this.name, key, 'double[]', [...value]);
  }

  setStringArray(key: string, value: readonly string[]): void {
    this.instance.write(this.name, key, 'string[]', [...value]);
  }

  subscribeNumberArray(key: string, defaultValue: number[]): TopicSubscriber<number[]> {
    return new Nt4TopicSubscriber(this.instance, this.name, key, 'double[]', isNumberArray, defaultValue);
  }

  private read<T extends NetworkTableValue>(
    key: string,
    type: Nt4ValueType,
    guard: ValueGuard<T>,
    defaultValue: T
  ): T {
    const stored = this.instance.read(this.name, key, type);
    if (!stored) {
      return defaultValue;
    }
    if (!guard(stored.value)) {
      logger.debug({ table: this.name, key }, 'Received value has a different type, using default');
      return defaultValue;
    }
    return copyValue(stored.value);
  }
}
