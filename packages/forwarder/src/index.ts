export * from './client';
export * from './contracts';
export * from './errors';
export * from './headers';
