export {
  ResultCache,
  cacheKey,
  type CacheEntry,
  type ResultCacheOptions,
  type ResultCacheStats,
} from './result-cache.js';
