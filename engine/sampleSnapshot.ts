// engine/sampleSnapshot.ts
// Representative sample snapshot, served only as a declared fallback when a
// refresh matched nothing.

import sampleData from '../data/sample_elp_data.json';

import { formatLastUpdated } from './buildSnapshot';
import { SAMPLE_DATA_SUFFIX } from './constants';
import type { ElpSnapshot } from './types';
import { isElpSnapshot } from './validateSnapshot';

export function loadSampleSnapshot(now: Date = new Date()): ElpSnapshot {
  const raw: unknown = structuredClone(sampleData);
  if (!isElpSnapshot(raw)) {
    throw new Error('Bundled sample snapshot does not match the snapshot contract');
  }

  return {
    ...raw,
    last_updated: `${formatLastUpdated(now)}${SAMPLE_DATA_SUFFIX}`,
    data_source: 'sample'
  };
}
