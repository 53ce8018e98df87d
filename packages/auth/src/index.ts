export * from './browser';
export * from './oauth/callbackHandler';
export * from './oauth/config';
export * from './oauth/exchange';
export * from './oauth/localCallback';
export * from './oauth/state';
export * from './tokens/tokenSource';
export * from './types';
