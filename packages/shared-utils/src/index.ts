// Validation utilities
export * from './validation';

// Identifier generation
export * from './crypto';

// Retry and timing utilities
export * from './retry';

// Logger
export * from './logger';
