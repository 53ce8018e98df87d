export * from './batch';
export * from './match/trackIdentity';
