export * from './types';
export * from './config/choreography';
export * from './physics';
export * from './util';
export * from './app/events';
export * from './app/replay';
export * from './app/solver';
export * from './app/target-frames';
export * from './app/trajectory';
export * from './app/walls';
export * from './app/choreographer';
