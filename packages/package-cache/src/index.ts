export { PackageCache } from "./cache";
export type { CacheEntry, CacheKey, CacheStats, EnsureResult } from "./cache";
