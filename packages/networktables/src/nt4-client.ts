/**
 * NT4 connection
 * Opens an ntcore-ts-client connection to a robot or a server address
 */

import { z } from 'zod';
import { NetworkTables, NetworkTablesTypeInfos } from 'ntcore-ts-client';
import { ValidationError, createChildLogger } from '@llvision/shared';
import { Nt4NetworkTableInstance } from './nt4-network-table.js';
import type { Nt4Client, Nt4Topic } from './nt4-network-table.js';
import type { NetworkTableValue, Nt4NetworkTableInstanceConfig } from './types.js';
import { isBoolean, isNumber, isNumberArray, isString, isStringArray } from './values.js';
import type { ValueGuard } from './values.js';

const logger = createChildLogger({ component: 'Nt4Client' });

const connectionOptionsSchema = z
  .object({
    team: z.number().int().min(1).max(25599).optional(),
    server: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
  })
  .refine((options) => options.team !== undefined || options.server !== undefined, {
    message: 'team or server is required',
  });

export interface Nt4ConnectionOptions {
  /** FRC team number; the server is looked up as the team's robot address */
  team?: number;
  /** Server host or address; wins over team when both are set */
  server?: string;
  port?: number;
}

interface ClientTopic<T> {
  subscribe(callback: (value: T | null) => void): number;
  unsubscribe(subscriptionId: number): void;
  publish(): unknown;
  setValue(value: T): void;
}

function adaptTopic<T extends NetworkTableValue>(name: string, topic: ClientTopic<T>, guard: ValueGuard<T>): Nt4Topic {
  return {
    subscribe: (callback) => topic.subscribe((value) => callback(value)),
    unsubscribe: (subscriptionId) => topic.unsubscribe(subscriptionId),
    publish: async () => {
      await topic.publish();
    },
    setValue: (value) => {
      if (!guard(value)) {
        throw new ValidationError(`Value does not match the type of ${name}`);
      }
      topic.setValue(value);
    },
  };
}

/**
 * Connect to an NT4 server. The connection opens in the background and
 * reconnects on its own; reads return defaults until values arrive.
 */
export function createNt4Client(options: Nt4ConnectionOptions): Nt4Client {
  const parsed = connectionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid NT4 connection options: ${parsed.error.errors
        .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
        .join('; ')}`
    );
  }

  const { team, server, port } = parsed.data;
  const ntcore =
    server !== undefined
      ? NetworkTables.getInstanceByURI(server, port)
      : NetworkTables.getInstanceByTeam(team ?? 0, port);

  logger.info({ team, server, port }, 'Connecting to NT4 server');

  return {
    createTopic(name, type) {
      switch (type) {
        case 'double':
          return adaptTopic(name, ntcore.createTopic<number>(name, NetworkTablesTypeInfos.kDouble), isNumber);
        case 'boolean':
          return adaptTopic(name, ntcore.createTopic<boolean>(name, NetworkTablesTypeInfos.kBoolean), isBoolean);
        case 'string':
          return adaptTopic(name, ntcore.createTopic<string>(name, NetworkTablesTypeInfos.kString), isString);
        case 'double[]':
          return adaptTopic(
            name,
            ntcore.createTopic<number[]>(name, NetworkTablesTypeInfos.kDoubleArray),
            isNumberArray
          );
        case 'string[]':
          return adaptTopic(
            name,
            ntcore.createTopic<string[]>(name, NetworkTablesTypeInfos.kStringArray),
            isStringArray
          );
      }
    },
  };
}

export function connectNetworkTables(
  options: Nt4ConnectionOptions,
  config: Partial<Nt4NetworkTableInstanceConfig> = {}
): Nt4NetworkTableInstance {
  return new Nt4NetworkTableInstance(createNt4Client(options), config);
}
