/**
 * Local NetworkTables
 * In-process implementation of the table interfaces, used when no server is
 * configured and as the stand-in for a camera in tests
 */

import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '@llvision/shared';
import type {
  LocalNetworkTableInstanceConfig,
  NetworkTable,
  NetworkTableInstance,
  NetworkTableValue,
  TimestampedValue,
  TopicSubscriber,
  ValueChangedEvent,
  ValueListener,
} from './types.js';
import { copyValue, isBoolean, isNumber, isNumberArray, isString, isStringArray, topicPath } from './values.js';
import type { ValueGuard } from './values.js';

const logger = createChildLogger({ component: 'LocalNetworkTables' });

const DEFAULT_CONFIG: LocalNetworkTableInstanceConfig = {
  clock: () => Math.floor(performance.now() * 1000),
  pollStorage: 20,
};

/**
 * Events emitted by the local instance
 */
export interface LocalNetworkTableInstanceEvents {
  /** A key was written */
  valueChanged: (event: ValueChangedEvent) => void;
  /** flush() was called; carries the running flush count */
  flush: (count: number) => void;
}

/**
 * Holds every table's values and fans writes out to listeners and subscribers
 */
export class LocalNetworkTableInstance
  extends EventEmitter<LocalNetworkTableInstanceEvents>
  implements NetworkTableInstance
{
  private config: LocalNetworkTableInstanceConfig;
  private values: Map<string, TimestampedValue<NetworkTableValue>> = new Map();
  private tables: Map<string, LocalNetworkTable> = new Map();
  private flushCount = 0;

  constructor(config: Partial<LocalNetworkTableInstanceConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getTable(name: string): LocalNetworkTable {
    let table = this.tables.get(name);
    if (!table) {
      table = new LocalNetworkTable(this, name);
      this.tables.set(name, table);
    }
    return table;
  }

  flush(): void {
    this.flushCount++;
    this.emit('flush', this.flushCount);
  }

  getFlushCount(): number {
    return this.flushCount;
  }

  /**
   * Current server time in microseconds
   */
  now(): number {
    return this.config.clock();
  }

  getPollStorage(): number {
    return this.config.pollStorage;
  }

  /**
   * Raw read, including the publish timestamp
   */
  read(topic: string): TimestampedValue<NetworkTableValue> | undefined {
    return this.values.get(topic);
  }

  /**
   * Every topic that currently holds a value
   */
  getTopics(): string[] {
    return Array.from(this.values.keys());
  }

  write(table: string, key: string, value: NetworkTableValue, timestamp: number = this.now()): void {
    const topic = topicPath(table, key);
    const stored = { value: copyValue(value), timestamp };
    this.values.set(topic, stored);

    this.emit('valueChanged', {
      topic,
      table,
      key,
      value: copyValue(stored.value),
      timestamp,
    });
  }

  close(): void {
    this.removeAllListeners();
  }

  /**
   * Drop every stored value; listeners and subscribers stay attached
   */
  clear(): void {
    this.values.clear();
  }
}

/**
 * Bounded queue of the samples published to one topic
 */
class LocalTopicSubscriber<T extends NetworkTableValue> implements TopicSubscriber<T> {
  readonly topic: string;
  private queue: TimestampedValue<T>[] = [];
  private closed = false;
  private readonly listener: (event: ValueChangedEvent) => void;

  constructor(
    private readonly instance: LocalNetworkTableInstance,
    table: string,
    key: string,
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
  }

  readQueue(): TimestampedValue<T>[] {
    const samples = this.queue;
    this.queue = [];
    return samples;
  }

  get(): T {
    const stored = this.instance.read(this.topic);
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

/**
 * One named table inside a local instance
 */
export class LocalNetworkTable implements NetworkTable {
  constructor(
    private readonly instance: LocalNetworkTableInstance,
    readonly name: string
  ) {}

  getInstance(): LocalNetworkTableInstance {
    return this.instance;
  }

  getNumber(key: string, defaultValue: number): number {
    return this.read(key, isNumber, defaultValue);
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    return this.read(key, isBoolean, defaultValue);
  }

  getString(key: string, defaultValue: string): string {
    return this.read(key, isString, defaultValue);
  }

  getNumberArray(key: string, defaultValue: number[]): number[] {
    return this.read(key, isNumberArray, defaultValue);
  }

  getStringArray(key: string, defaultValue: string[]): string[] {
    return this.read(key, isStringArray, defaultValue);
  }

  setNumber(key: string, value: number): void {
    this.instance.write(this.name, key, value);
  }

  setBoolean(key: string, value: boolean): void {
    this.instance.write(this.name, key, value);
  }

  setString(key: string, value: string): void {
    this.instance.write(this.name, key, value);
  }

  setNumberArray(key: string, value: readonly number[]): void {
    this.instance.write(this.name, key, [...value]);
  }

  setStringArray(key: string, value: readonly string[]): void {
    this.instance.write(this.name, key, [...value]);
  }

  subscribeNumberArray(key: string, defaultValue: number[]): TopicSubscriber<number[]> {
    return new LocalTopicSubscriber(this.instance, this.name, key, isNumberArray, defaultValue);
  }

  /**
   * Listen for writes to one key. Returns an unsubscribe function.
   */
  onChange(key: string, listener: ValueListener): () => void {
    const topic = topicPath(this.name, key);
    const filtered = (event: ValueChangedEvent) => {
      if (event.topic === topic) listener(event);
    };
    this.instance.on('valueChanged', filtered);
    return () => {
      this.instance.off('valueChanged', filtered);
    };
  }

  private read<T extends NetworkTableValue>(key: string, guard: ValueGuard<T>, defaultValue: T): T {
    const stored = this.instance.read(topicPath(this.name, key));
    if (!stored) {
      return defaultValue;
    }
    if (!guard(stored.value)) {
      logger.debug({ table: this.name, key }, 'Stored value has a different type, using default');
      return defaultValue;
    }
    return copyValue(stored.value);
  }
}
