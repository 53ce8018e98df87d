export * from './jobs/progress';
