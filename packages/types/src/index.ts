// Types
export * from './types/index.js';

// Zod schemas
export * from './schemas/index.js';

// Pure utils (constants, formatting)
export * from './utils/index.js';
