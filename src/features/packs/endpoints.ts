import type { PackIndexEntry, PackScaleRef } from './schema';

export interface PackEndpoints {
  primaryBase: string;
  fallbackBase: string;
  indexPath: string;
}

export interface ResolvedEndpoint {
  primary: string;
  fallback: string;
}

// Appends each path component to the base. A trailing slash on the relative
// path is preserved so directory-like requests stay recognisable downstream.
export function joinURL(base: string, relativePath: string): string {
  const root = base.replace(/\/+$/, '');
  const components = relativePath.split('/').filter(Boolean).map(encodeURIComponent);
  const directoryLike = relativePath === '' || relativePath.endsWith('/');
  return `${root}/${components.join('/')}${directoryLike && components.length ? '/' : ''}`;
}

export function resolveEndpoint(endpoints: PackEndpoints, relativePath: string): ResolvedEndpoint {
  return {
    primary: joinURL(endpoints.primaryBase, relativePath),
    fallback: joinURL(endpoints.fallbackBase, relativePath),
  };
}

export function packDocumentPath(entry: PackIndexEntry): string {
  return `${entry.path}/pack.json`;
}

export function scaleDocumentPath(entry: PackIndexEntry, scale: PackScaleRef): string {
  return `${entry.path}/${scale.path}`;
}
