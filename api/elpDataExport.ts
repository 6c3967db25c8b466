// api/elpDataExport.ts
// Download the persisted snapshot as ELP_Dashboard_Data.xlsx

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { loadStorageConfig } from '../engine/config';
import { ErrorCodes } from '../engine/errorCodes';
import { errorMessage, logError } from '../engine/logger';
import {
  SNAPSHOT_WORKBOOK_FILENAME,
  XLSX_CONTENT_TYPE,
  buildSnapshotWorkbook
} from '../engine/snapshotWorkbook';
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

    const buffer = await buildSnapshotWorkbook(snapshot);

    res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="${SNAPSHOT_WORKBOOK_FILENAME}"`);
    return res.status(200).send(buffer);
  } catch (err) {
    logError('snapshot_export_failed', { pathname: blobPathname, error: errorMessage(err) });
    return res.status(500).json({
      error: 'ELP snapshot export failed.',
      code: ErrorCodes.SOURCE_UNAVAILABLE,
      error_codes: [ErrorCodes.SOURCE_UNAVAILABLE]
    });
  }
}
