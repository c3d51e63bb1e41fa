/**
 * NT4 connection tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError } from '@llvision/shared';
import { connectNetworkTables, createNt4Client } from './nt4-client.js';
import { Nt4NetworkTableInstance } from './nt4-network-table.js';

const { mockGetInstanceByTeam, mockGetInstanceByURI, mockCreateTopic } = vi.hoisted(() => ({
  mockGetInstanceByTeam: vi.fn(),
  mockGetInstanceByURI: vi.fn(),
  mockCreateTopic: vi.fn(),
}));

vi.mock('ntcore-ts-client', () => ({
  NetworkTables: {
    getInstanceByTeam: mockGetInstanceByTeam,
    getInstanceByURI: mockGetInstanceByURI,
  },
  NetworkTablesTypeInfos: {
    kBoolean: [0, 'boolean'],
    kDouble: [1, 'double'],
    kString: [4, 'string'],
    kDoubleArray: [17, 'double[]'],
    kStringArray: [20, 'string[]'],
  },
}));

function fakeTopic() {
  return {
    subscribe: vi.fn(() => 7),
    unsubscribe: vi.fn(),
    publish: vi.fn(async () => undefined),
    setValue: vi.fn(),
  };
}

describe('createNt4Client()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockGetInstanceByTeam.mockReturnValue({ createTopic: mockCreateTopic });
    mockGetInstanceByURI.mockReturnValue({ createTopic: mockCreateTopic });
  });

  it('should connect by team number', () => {
    createNt4Client({ team: 1234 });

    expect(mockGetInstanceByTeam).toHaveBeenCalledWith(1234, undefined);
    expect(mockGetInstanceByURI).not.toHaveBeenCalled();
  });

  it('should prefer a server address over the team', () => {
    createNt4Client({ team: 1234, server: '10.12.34.2', port: 5810 });

    expect(mockGetInstanceByURI).toHaveBeenCalledWith('10.12.34.2', 5810);
    expect(mockGetInstanceByTeam).not.toHaveBeenCalled();
  });

  it('should reject options without a team or server', () => {
    expect(() => createNt4Client({})).toThrow(ValidationError);
    expect(() => createNt4Client({})).toThrow('Invalid NT4 connection options: team or server is required');
  });

  it('should reject an out of range port', () => {
    expect(() => createNt4Client({ team: 1234, port: 0 })).toThrow(ValidationError);
  });

  it('should create topics with the matching type info', () => {
    mockCreateTopic.mockImplementation(() => fakeTopic());
    const client = createNt4Client({ team: 1234 });

    client.createTopic('/limelight/tx', 'double');
    client.createTopic('/limelight/json', 'string');
    client.createTopic('/limelight/t2d', 'double[]');
    client.createTopic('/limelight/rawbarcodes', 'string[]');
    client.createTopic('/limelight/flag', 'boolean');

    expect(mockCreateTopic.mock.calls).toEqual([
      ['/limelight/tx', [1, 'double']],
      ['/limelight/json', [4, 'string']],
      ['/limelight/t2d', [17, 'double[]']],
      ['/limelight/rawbarcodes', [20, 'string[]']],
      ['/limelight/flag', [0, 'boolean']],
    ]);
  });

  it('should pass values and subscriptions through to the client topic', async () => {
    const topic = fakeTopic();
    mockCreateTopic.mockReturnValue(topic);
    const client = createNt4Client({ team: 1234 });
    const nt4Topic = client.createTopic('/limelight/pipeline', 'double');
    const callback = vi.fn();

    expect(nt4Topic.subscribe(callback)).toBe(7);
    nt4Topic.unsubscribe(7);
    await nt4Topic.publish();
    nt4Topic.setValue(2);

    expect(topic.unsubscribe).toHaveBeenCalledWith(7);
    expect(topic.publish).toHaveBeenCalledTimes(1);
    expect(topic.setValue).toHaveBeenCalledWith(2);
  });

  it('should refuse a value of another type', () => {
    const topic = fakeTopic();
    mockCreateTopic.mockReturnValue(topic);
    const nt4Topic = createNt4Client({ team: 1234 }).createTopic('/limelight/pipeline', 'double');

    expect(() => nt4Topic.setValue('one')).toThrow('Value does not match the type of /limelight/pipeline');
    expect(topic.setValue).not.toHaveBeenCalled();
  });
});

describe('connectNetworkTables()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockGetInstanceByURI.mockReturnValue({ createTopic: mockCreateTopic });
    mockCreateTopic.mockImplementation(() => fakeTopic());
  });

  it('should wrap the connection in a table instance', () => {
    const instance = connectNetworkTables({ server: 'localhost' }, { pollStorage: 5 });

    expect(instance).toBeInstanceOf(Nt4NetworkTableInstance);
    expect(instance.getPollStorage()).toBe(5);
    expect(instance.getTable('limelight').getNumber('tx', 0)).toBe(0);
    expect(mockCreateTopic).toHaveBeenCalledWith('/limelight/tx', [1, 'double']);
  });
});
