export { loadConfig } from './loader';
export * from './schema';
