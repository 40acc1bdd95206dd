export * from './action.js';
export * from './plan.js';
export * from './snapshot.js';
export * from './step-result.js';
export * from './extraction.js';
