/**
 * NetworkTables Types
 * Capability interfaces for the real-time key-value table a camera publishes to
 */

export type NetworkTableValue = number | boolean | string | number[] | string[];

/**
 * A value together with the server time it was published at
 */
export interface TimestampedValue<T> {
  value: T;
  /** Server timestamp in microseconds */
  timestamp: number;
}

export interface ValueChangedEvent {
  /** Full topic path, e.g. `/limelight/tx` */
  topic: string;
  table: string;
  key: string;
  value: NetworkTableValue;
  timestamp: number;
}

export type ValueListener = (event: ValueChangedEvent) => void;

/**
 * Queue of every value published to one topic since the last read
 */
export interface TopicSubscriber<T> {
  readonly topic: string;
  /** Drain queued samples, oldest first */
  readQueue(): TimestampedValue<T>[];
  /** Latest value, or the subscriber's default */
  get(): T;
  close(): void;
}

export interface NetworkTable {
  readonly name: string;

  getInstance(): NetworkTableInstance;

  // Reads return the default when the key is unset or holds another type
  getNumber(key: string, defaultValue: number): number;
  getBoolean(key: string, defaultValue: boolean): boolean;
  getString(key: string, defaultValue: string): string;
  getNumberArray(key: string, defaultValue: number[]): number[];
  getStringArray(key: string, defaultValue: string[]): string[];

  setNumber(key: string, value: number): void;
  setBoolean(key: string, value: boolean): void;
  setString(key: string, value: string): void;
  setNumberArray(key: string, value: readonly number[]): void;
  setStringArray(key: string, value: readonly string[]): void;

  subscribeNumberArray(key: string, defaultValue: number[]): TopicSubscriber<number[]>;
}

export interface NetworkTableInstance {
  getTable(name: string): NetworkTable;
  /** Push pending writes to the network immediately */
  flush(): void;
  /** Drop every subscription and listener */
  close(): void;
}

export interface LocalNetworkTableInstanceConfig {
  /** Server clock in microseconds */
  clock: () => number;
  /** Samples kept per subscriber between reads */
  pollStorage: number;
}

export interface Nt4NetworkTableInstanceConfig {
  /** Local clock in microseconds, stamped on samples as they arrive */
  clock: () => number;
  /** Samples kept per subscriber between reads */
  pollStorage: number;
}
