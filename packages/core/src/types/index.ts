/**
 * TaskMatch Type Definitions
 */

export * from './agent.js';
export * from './discovery.js';
