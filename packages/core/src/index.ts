/**
 * @toolgate/core
 *
 * Core package exports: SPI interfaces, database layer, config loader,
 * audit pipeline, validation and utilities.
 */

// Database layer
export * from './db/index.js';

// Schema tables and row types
export * from './schema/index.js';

// SPI interfaces
export * from './spi/index.js';

// Configuration loader with secrets resolution
export * from './config/index.js';

// Audit pipeline and masking
export * from './audit/index.js';

// Input validation
export * from './validation/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/json.js';
export * from './utils/logger.js';
export * from './utils/timeout.js';
