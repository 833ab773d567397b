export { DocumentCache, computeTextStats } from "./document-cache.js";
export type { DocumentCacheOptions, CachedDocumentSummary } from "./document-cache.js";
