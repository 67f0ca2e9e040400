/**
 * Service layer types
 */

export type * from './block/index.js';
