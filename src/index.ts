export * from './config.js';
export * from './errors.js';
export * from './logger.js';
export * from './discovery/types.js';
export * from './discovery/address-space.js';
export * from './discovery/neighbor-table.js';
export * from './discovery/capabilities.js';
export * from './discovery/device.js';
export * from './discovery/session.js';
export * from './discovery/network.js';
export * from './discovery/host-probe.js';
export * from './discovery/discovery-engine.js';
export * from './protocol/messages.js';
export * from './protocol/codec.js';
export * from './connection/types.js';
export * from './connection/frames.js';
export * from './connection/connection-manager.js';
export * from './simulator/device-simulator.js';
