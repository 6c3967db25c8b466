// engine/snapshotStore.ts
//
// Persisted dashboard snapshot in Vercel Blob. One object at a fixed
// pathname, overwritten on every refresh.

import { list, put } from '@vercel/blob';

import { DEFAULT_STORAGE_CONFIG } from './config';
import { logInfo } from './logger';
import type { ElpSnapshot } from './types';
import { isElpSnapshot } from './validateSnapshot';

export interface StoredSnapshot {
  url: string;
  pathname: string;
}

export async function saveSnapshot(
  snapshot: ElpSnapshot,
  pathname: string = DEFAULT_STORAGE_CONFIG.blobPathname
): Promise<StoredSnapshot> {
  const blob = await put(pathname, JSON.stringify(snapshot, null, 2), {
    access: 'public',
    contentType: 'application/json',
    addRandomSuffix: false,
    cacheControlMaxAge: 60
  });

  logInfo('snapshot_stored', {
    pathname: blob.pathname,
    total_oos: snapshot.total_oos,
    data_source: snapshot.data_source
  });

  return { url: blob.url, pathname: blob.pathname };
}

/**
 * Read the stored snapshot back. Null when nothing has been stored yet.
 * Throws when the object exists but cannot be read or fails the shape check.
 */
export async function loadSnapshot(
  pathname: string = DEFAULT_STORAGE_CONFIG.blobPathname
): Promise<ElpSnapshot | null> {
  const page = await list({ prefix: pathname, limit: 10 });
  const blob = page.blobs.find((b) => b.pathname === pathname);
  if (!blob) return null;

  const response = await fetch(blob.url, { signal: AbortSignal.timeout(15000) });
  if (!response.ok) {
    throw new Error(`Snapshot read failed: HTTP ${response.status}`);
  }

  const data: unknown = await response.json();
  if (!isElpSnapshot(data)) {
    throw new Error(`Stored object at ${pathname} is not a valid ELP snapshot`);
  }
  return data;
}
