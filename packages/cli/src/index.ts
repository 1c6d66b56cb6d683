export * from './app';
export * from './args';
export * from './env';
export * from './logger';
export * from './main';
export * from './play';
export * from './render';
