/**
 * Remote Identity
 *
 * Canonicalizes git remote URLs to (host, owner, name). Accepted forms:
 *
 *   git@github.com:owner/name.git            scp-like
 *   ssh://git@github.com[:22]/owner/name.git
 *   https://[user@]github.com[:443]/owner/name[.git][/]
 *   http://, git://, git+ssh:// variants of the above
 *
 * Anything else has no identity. Parsing never throws.
 */

import type { RemoteIdentity } from './types.js';

const URL_FORM = /^([a-z][a-z0-9+]*):\/\/(?:[^@/]+@)?([^/:@]+)(?::(\d+))?(\/.*)$/i;
const SCP_FORM = /^(?:[^@/:\s]+@)?([^@/:\s]+):([^/\\].*)$/;
const SCHEMES = new Set(['https', 'http', 'ssh', 'git', 'git+ssh', 'ssh+git']);
const HOST = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?(\.[a-z0-9]([a-z0-9-]*[a-z0-9])?)*$/;
const SEGMENT = /^[A-Za-z0-9._-]+$/;

function fromPath(rawHost: string, rawPath: string): RemoteIdentity | null {
  const host = rawHost.toLowerCase();
  if (!HOST.test(host)) return null;

  const trimmed = rawPath.replace(/^\/+/, '').replace(/\/+$/, '');
  const segments = trimmed.split('/');
  if (segments.length !== 2) return null;

  const owner = segments[0];
  const name = segments[1].endsWith('.git') ? segments[1].slice(0, -4) : segments[1];

  for (const segment of [owner, name]) {
    if (!SEGMENT.test(segment) || segment === '.' || segment === '..') return null;
  }

  return { host, owner, name };
}

export function parseRemoteUrl(url: string): RemoteIdentity | null {
  const value = url.trim();
  if (!value) return null;

  const urlMatch = URL_FORM.exec(value);
  if (urlMatch) {
    if (!SCHEMES.has(urlMatch[1].toLowerCase())) return null;
    return fromPath(urlMatch[2], urlMatch[4]);
  }

  // Anything else with "://" is a URL in a scheme or shape we don't accept
  if (value.includes('://')) return null;

  const scpMatch = SCP_FORM.exec(value);
  if (scpMatch) {
    return fromPath(scpMatch[1], scpMatch[2]);
  }

  return null;
}

export function identityKey(identity: RemoteIdentity): string {
  return `${identity.host}/${identity.owner}/${identity.name}`;
}

export function parseIdentityKey(key: string): RemoteIdentity | null {
  const parts = key.split('/');
  if (parts.length !== 3) return null;
  const [host, owner, name] = parts;
  const identity = fromPath(host, `${owner}/${name}`);
  // Keys are stored canonical; reject anything that would re-canonicalize differently
  return identity && identityKey(identity) === key ? identity : null;
}

export function identityWebUrl(identity: RemoteIdentity): string {
  return `https://${identity.host}/${identity.owner}/${identity.name}`;
}
