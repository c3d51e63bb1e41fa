/**
 * LocalNetworkTable Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LocalNetworkTableInstance } from './local-network-table.js';

describe('LocalNetworkTableInstance', () => {
  let now: number;
  let instance: LocalNetworkTableInstance;

  beforeEach(() => {
    now = 1_000_000;
    instance = new LocalNetworkTableInstance({ clock: () => now, pollStorage: 3 });
  });

  describe('typed reads', () => {
    it('should return the default when a key is unset', () => {
      const table = instance.getTable('limelight');

      expect(table.getNumber('tx', 0)).toBe(0);
      expect(table.getString('json', '')).toBe('');
      expect(table.getNumberArray('hw', [])).toEqual([]);
      expect(table.getStringArray('rawbarcodes', ['none'])).toEqual(['none']);
      expect(table.getBoolean('flag', true)).toBe(true);
    });

    it('should return stored values of the requested type', () => {
      const table = instance.getTable('limelight');
      table.setNumber('tx', 12.5);
      table.setString('getpipetype', 'pipe_fiducial');
      table.setNumberArray('hw', [30, 45, 60, 40]);
      table.setStringArray('rawbarcodes', ['abc', 'def']);
      table.setBoolean('flag', false);

      expect(table.getNumber('tx', 0)).toBe(12.5);
      expect(table.getString('getpipetype', '')).toBe('pipe_fiducial');
      expect(table.getNumberArray('hw', [])).toEqual([30, 45, 60, 40]);
      expect(table.getStringArray('rawbarcodes', [])).toEqual(['abc', 'def']);
      expect(table.getBoolean('flag', true)).toBe(false);
    });

    it('should return the default when the stored type differs', () => {
      const table = instance.getTable('limelight');
      table.setString('tx', 'not a number');
      table.setNumberArray('json', [1, 2]);

      expect(table.getNumber('tx', -1)).toBe(-1);
      expect(table.getString('json', 'fallback')).toBe('fallback');
    });

    it('should not let callers mutate stored arrays', () => {
      const table = instance.getTable('limelight');
      const written = [1, 2, 3];
      table.setNumberArray('t2d', written);
      written[0] = 99;

      const read = table.getNumberArray('t2d', []);
      read[1] = 42;

      expect(table.getNumberArray('t2d', [])).toEqual([1, 2, 3]);
    });

    it('should keep tables separate', () => {
      instance.getTable('front').setNumber('tx', 1);
      instance.getTable('back').setNumber('tx', 2);

      expect(instance.getTable('front').getNumber('tx', 0)).toBe(1);
      expect(instance.getTable('back').getNumber('tx', 0)).toBe(2);
    });

    it('should return the same table object for the same name', () => {
      expect(instance.getTable('limelight')).toBe(instance.getTable('limelight'));
    });
  });

  describe('flush()', () => {
    it('should count flushes and emit the running count', () => {
      const onFlush = vi.fn();
      instance.on('flush', onFlush);

      instance.flush();
      instance.flush();

      expect(instance.getFlushCount()).toBe(2);
      expect(onFlush).toHaveBeenLastCalledWith(2);
    });
  });

  describe('onChange()', () => {
    it('should notify listeners for the watched key only', () => {
      const table = instance.getTable('limelight');
      const listener = vi.fn();
      table.onChange('tv', listener);

      table.setNumber('tx', 3);
      table.setNumber('tv', 1);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({
        topic: '/limelight/tv',
        table: 'limelight',
        key: 'tv',
        value: 1,
        timestamp: 1_000_000,
      });
    });

    it('should stop notifying after unsubscribe', () => {
      const table = instance.getTable('limelight');
      const listener = vi.fn();
      const unsubscribe = table.onChange('tv', listener);

      unsubscribe();
      table.setNumber('tv', 1);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('subscribeNumberArray()', () => {
    it('should queue every sample with its publish timestamp', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', []);

      table.setNumberArray('botpose_wpiblue', [1]);
      now = 2_000_000;
      table.setNumberArray('botpose_wpiblue', [2]);

      expect(subscriber.readQueue()).toEqual([
        { value: [1], timestamp: 1_000_000 },
        { value: [2], timestamp: 2_000_000 },
      ]);
      expect(subscriber.readQueue()).toEqual([]);
    });

    it('should drop the oldest samples beyond poll storage', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', []);

      for (let i = 1; i <= 5; i++) {
        table.setNumberArray('botpose_wpiblue', [i]);
      }

      expect(subscriber.readQueue().map((sample) => sample.value)).toEqual([[3], [4], [5]]);
    });

    it('should ignore samples of other types and other topics', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', []);

      table.setString('botpose_wpiblue', 'oops');
      table.setNumberArray('botpose_wpired', [1]);

      expect(subscriber.readQueue()).toEqual([]);
    });

    it('should give each subscriber its own copy of a sample', () => {
      const table = instance.getTable('limelight');
      const first = table.subscribeNumberArray('botpose_wpiblue', []);
      const second = table.subscribeNumberArray('botpose_wpiblue', []);

      table.setNumberArray('botpose_wpiblue', [1, 2, 3, 4, 5, 6, 33, 1]);

      const [firstSample] = first.readQueue();
      if (firstSample) {
        firstSample.value[7] = 0;
      }

      expect(firstSample?.value[7]).toBe(0);
      expect(second.readQueue()).toEqual([{ value: [1, 2, 3, 4, 5, 6, 33, 1], timestamp: 1_000_000 }]);
    });

    it('should expose the latest value through get()', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', [0]);

      expect(subscriber.get()).toEqual([0]);

      table.setNumberArray('botpose_wpiblue', [7, 8]);

      expect(subscriber.get()).toEqual([7, 8]);
    });

    it('should stop queueing once closed', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', []);

      subscriber.close();
      table.setNumberArray('botpose_wpiblue', [1]);

      expect(subscriber.readQueue()).toEqual([]);
      expect(instance.listenerCount('valueChanged')).toBe(0);
    });
  });

  describe('clear()', () => {
    it('should drop stored values', () => {
      const table = instance.getTable('limelight');
      table.setNumber('tx', 4);

      instance.clear();

      expect(table.getNumber('tx', 0)).toBe(0);
      expect(instance.getTopics()).toEqual([]);
    });
  });

  describe('close()', () => {
    it('should detach listeners and subscribers', () => {
      const table = instance.getTable('limelight');
      const subscriber = table.subscribeNumberArray('botpose_wpiblue', []);
      table.onChange('tv', vi.fn());

      instance.close();
      table.setNumberArray('botpose_wpiblue', [1]);

      expect(instance.listenerCount('valueChanged')).toBe(0);
      expect(subscriber.readQueue()).toEqual([]);
    });
  });
});
