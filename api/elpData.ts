// api/elpData.ts
// GET the persisted dashboard snapshot (elp_data.json equivalent).

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { loadStorageConfig } from '../engine/config';
import { ErrorCodes } from '../engine/errorCodes';
import { errorMessage, logError } from '../engine/logger';
import { loadSnapshot } from '../engine/snapshotStore';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const { blobPathname } = loadStorageConfig();

  try {
    const snapshot = await loadSnapshot(blobPathname);
    if (!snapshot) {
      return res.status(404).json({ error: 'No ELP snapshot has been stored yet.' });
    }

    res.setHeader('Cache-Control', 's-maxage=300, stale-while-revalidate=600');
    return res.status(200).json(snapshot);
  } catch (err) {
    logError('snapshot_read_failed', { pathname: blobPathname, error: errorMessage(err) });
    return res.status(500).json({
      error: 'Stored ELP snapshot could not be read.',
      code: ErrorCodes.SOURCE_UNAVAILABLE,
      error_codes: [ErrorCodes.SOURCE_UNAVAILABLE]
    });
  }
}
