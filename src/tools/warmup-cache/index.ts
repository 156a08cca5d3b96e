/**
 * Warm-up Cache Tool
 */

export { warmupCache, type WarmupCacheParams, type WarmupCacheResult } from './tool';
