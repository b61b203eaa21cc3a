export * from './types/api';
export * from './types/packets';
