// src/core/resolver/hosts.ts
import hostList from './hosts.json';

export const SUPPORTED_HOSTS: readonly string[] = hostList;

/**
 * Host part of a URL-ish string, lower-cased. Works on inputs the WHATWG
 * parser rejects (missing scheme, stray spaces). Returns '' when there is none.
 */
export function extractHost(url: string): string {
  let rest = url.trim();

  const schemeEnd = rest.indexOf('://');
  if (schemeEnd !== -1) {
    rest = rest.slice(schemeEnd + 3);
  }

  // user-info only counts inside the authority, before any path/query/fragment
  const authorityEnd = rest.search(/[/?#]/);
  const authority = authorityEnd === -1 ? rest : rest.slice(0, authorityEnd);
  const at = authority.lastIndexOf('@');
  if (at !== -1) {
    rest = rest.slice(at + 1);
  }

  const hostEnd = rest.search(/[:/?#]/);
  const host = hostEnd === -1 ? rest : rest.slice(0, hostEnd);
  return host.toLowerCase();
}

/**
 * Bidirectional substring match against the host list, so an entry such as
 * "x.com" also matches "box.com".
 */
export function isSupportedHost(host: string, hosts: readonly string[] = SUPPORTED_HOSTS): boolean {
  if (!host) return false;
  return hosts.some(entry => host.includes(entry) || entry.includes(host));
}

export function canHandleUrl(url: string, hosts: readonly string[] = SUPPORTED_HOSTS): boolean {
  if (typeof url !== 'string' || url.length === 0) return false;
  return isSupportedHost(extractHost(url), hosts);
}
