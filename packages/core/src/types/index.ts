export type * from './connectivity.js';
export type * from './storage.js';
export type * from './sync.js';
export type * from './transport.js';
