import path from 'node:path';
import type { CallerIdentity } from '../clients/types.js';

const ACCOUNT_ID = /^\d{12}$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD-HHMMSS` in UTC. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function accountSuffix(identity: CallerIdentity = {}): string | null {
  if (identity.accountId && ACCOUNT_ID.test(identity.accountId)) {
    return identity.accountId;
  }
  if (identity.accountAlias) {
    const safe = identity.accountAlias.replace(/[^a-zA-Z0-9_-]/g, '-').replace(/^-+|-+$/g, '');
    if (safe) return safe.slice(0, 32);
  }
  return null;
}

export function runId(identity: CallerIdentity = {}, now: Date = new Date()): string {
  const suffix = accountSuffix(identity);
  const stamp = formatRunTimestamp(now);
  return suffix ? `run-${stamp}-${suffix}` : `run-${stamp}`;
}

/**
 * `<base>/run-YYYYMMDD-HHMMSS-<account>`; the account part is omitted when
 * neither a 12-digit id nor a usable alias is known.
 */
export function resolveRunDir(base: string, identity: CallerIdentity = {}, now: Date = new Date()): string {
  return path.join(base, runId(identity, now));
}
