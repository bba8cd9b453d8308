export * from './options.js';
export { parseFileSize, formatBytes } from '../utils/size.js';
