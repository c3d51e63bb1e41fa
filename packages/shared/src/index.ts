/**
 * @llvision/shared
 * Logging, errors, and configuration shared by the llvision packages
 */

export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
