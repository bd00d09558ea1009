export * from './models';
export * from './api';
