export * from './types';
export * from './constants';
export * from './errors';
export * from './result';
export * from './series-key';
export * from './tracing';
export * from './validation';
export * from './config';
export * from './events';
