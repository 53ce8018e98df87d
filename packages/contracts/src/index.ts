export * from './errors';
export * from './models';
export * from './progress';
export * from './providers';
