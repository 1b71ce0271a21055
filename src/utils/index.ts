export { StringPool, type StringInterner, type StringPoolStatistics } from './string-pool.js';
