export * from './types';
export * from './errors';
export * from './schemas';
export * from './config';
export * from './logger';
export * from './cancel';
