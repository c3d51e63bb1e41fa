/**
 * Value guards shared by the table implementations
 */

import type { NetworkTableValue } from './types.js';

export type ValueGuard<T extends NetworkTableValue> = (value: NetworkTableValue) => value is T;

export const isNumber: ValueGuard<number> = (value): value is number => typeof value === 'number';
export const isBoolean: ValueGuard<boolean> = (value): value is boolean => typeof value === 'boolean';
export const isString: ValueGuard<string> = (value): value is string => typeof value === 'string';
export const isNumberArray: ValueGuard<number[]> = (value): value is number[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'number');
export const isStringArray: ValueGuard<string[]> = (value): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

/**
 * Arrays are cloned so no two readers share one
 */
export function copyValue<T extends NetworkTableValue>(value: T): T {
  return Array.isArray(value) ? structuredClone(value) : value;
}

export function topicPath(table: string, key: string): string {
  return `/${table}/${key}`;
}
