export type * from './fragment.js';
export type * from './outline.js';
export type * from './config.js';
