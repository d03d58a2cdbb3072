export { offsetForDate } from "./offsets.js";
export { TimezoneResolver } from "./resolver.js";
export type {
  CacheEntry,
  LookupFailure,
  ResolveResult,
  TimezoneResolverOptions,
} from "./resolver.js";
