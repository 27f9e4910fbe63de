/**
 * Schema module: zod shapes for every document redloop reads or writes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './plan.js';
export * from './findings.js';
export * from './taskSet.js';
export * from './results.js';
