export * from './schema';
export * from './ConfigLoader';
