/**
 * middleware/index.ts — Barrel export for the request-level layer.
 */

// ── Fetch layer ─────────────────────────────────────────────
export { PageFetcher, detectContentKind, looksLikePlaceholder } from './pageFetcher';
export type { PageFetchOptions, PageFetcherDeps } from './pageFetcher';
export { lightFetch } from './lightFetcher';
export type { LightFetchOptions, LightFetchResult, StaticFetch } from './lightFetcher';

// ── Chain guard ─────────────────────────────────────────────
export { ChainGuard } from './chainGuard';
