export * from './env.validation';
export * from './maptiler.config';
