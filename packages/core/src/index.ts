/**
 * TaskMatch Core
 * Barrel export for shared types and logging
 */

// Logger (must be first - no dependencies)
export * from './logger.js';

// Type definitions
export * from './types/index.js';
