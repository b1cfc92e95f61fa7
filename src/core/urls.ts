import type { ContentKind } from './types';

/** True for well-formed absolute http(s) URLs. */
export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

/** Resolve `href` against `base`; null for unusable hrefs (javascript:, mailto:, garbage). */
export function resolveUrl(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;
  try {
    const resolved = new URL(trimmed, base).toString();
    return isAbsoluteHttpUrl(resolved) ? resolved : null;
  } catch {
    return null;
  }
}

const EXTENSION_KINDS: Record<string, ContentKind> = {
  pdf: 'pdf',
  csv: 'csv',
  xlsx: 'xlsx',
  xls: 'xlsx',
  json: 'json',
  html: 'html',
  htm: 'html',
};

/** Content kind implied by the URL path's extension, if any. */
export function kindFromExtension(url: string): ContentKind | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const match = pathname.toLowerCase().match(/\.([a-z0-9]+)$/);
  if (!match) return null;
  return EXTENSION_KINDS[match[1]] ?? null;
}

/** Links to .csv / .xlsx / .pdf / .json resources count as data files. */
export function isDataFileUrl(url: string): boolean {
  const kind = kindFromExtension(url);
  return kind !== null && kind !== 'html';
}

/** Compare URLs ignoring a trailing slash and fragment. */
export function sameUrl(a: string, b: string): boolean {
  return normalizeForComparison(a) === normalizeForComparison(b);
}

export function sameOrigin(a: string, b: string): boolean {
  try {
    return new URL(a).origin === new URL(b).origin;
  } catch {
    return false;
  }
}

function normalizeForComparison(value: string): string {
  try {
    const parsed = new URL(value.trim());
    parsed.hash = '';
    return parsed.toString().replace(/\/$/, '');
  } catch {
    return value.trim().replace(/\/$/, '');
  }
}
