/**
 * @llvision/networktables
 * Key-value publish/subscribe table interfaces, an NT4 client adapter and an
 * in-process implementation
 */

export * from './types.js';
export { topicPath } from './values.js';
export { LocalNetworkTable, LocalNetworkTableInstance } from './local-network-table.js';
export type { LocalNetworkTableInstanceEvents } from './local-network-table.js';
export { Nt4NetworkTable, Nt4NetworkTableInstance } from './nt4-network-table.js';
export type { Nt4Client, Nt4NetworkTableInstanceEvents, Nt4Topic, Nt4ValueType } from './nt4-network-table.js';
export { connectNetworkTables, createNt4Client } from './nt4-client.js';
export type { Nt4ConnectionOptions } from './nt4-client.js';
export { getDefaultInstance, resetDefaultInstance } from './default-instance.js';
