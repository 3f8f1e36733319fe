export * from './types/model.js';
export * from './types/budget.js';
export * from './types/call.js';
export * from './types/config.js';
export * from './types/shape.js';
export * from './constants.js';
export * from './utils/index.js';
export * from './schemas/model.schema.js';
export * from './schemas/budget.schema.js';
export * from './schemas/shape.schema.js';
export * from './schemas/config.schema.js';
