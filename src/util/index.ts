export * from './geometry';
export * from './log';
export * from './random';
export * from './rect-merge';
