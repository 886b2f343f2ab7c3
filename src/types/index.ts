export type * from './model';
export type * from './config';
export type * from './patch';
export type * from './diagnostics';
export type { Simplify } from './types-helper';
