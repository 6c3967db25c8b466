import { describe, expect, it } from 'vitest';

import {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_SOCRATA_CONFIG,
  loadPipelineConfig,
  loadSocrataConfig,
  loadStorageConfig,
  parseBool
} from '../engine/config';

describe('parseBool', () => {
  it('accepts the usual truthy spellings', () => {
    for (const v of ['1', 'true', 'TRUE', ' yes ', 'y']) {
      expect(parseBool(v)).toBe(true);
    }
    for (const v of ['0', 'false', '', undefined, null, 'off']) {
      expect(parseBool(v)).toBe(false);
    }
  });
});

describe('loadPipelineConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('reads overrides', () => {
    expect(
      loadPipelineConfig({
        ELP_ANALYSIS_START_YEAR: '2024',
        ELP_MONTH_SOURCE: 'inspection',
        ELP_DUPLICATE_POLICY: 'first-seen',
        ELP_MATCH_DESCRIPTION: 'true',
        ELP_CHUNK_SIZE: '250'
      })
    ).toEqual({
      analysisStartYear: 2024,
      monthSource: 'inspection',
      duplicatePolicy: 'first-seen',
      matchDescriptionKeywords: true,
      chunkSize: 250
    });
  });

  it('falls back on invalid values', () => {
    const config = loadPipelineConfig({
      ELP_ANALYSIS_START_YEAR: 'soon',
      ELP_MONTH_SOURCE: 'report',
      ELP_DUPLICATE_POLICY: 'newest',
      ELP_CHUNK_SIZE: '0'
    });
    expect(config).toEqual(DEFAULT_PIPELINE_CONFIG);
  });
});

describe('loadSocrataConfig', () => {
  it('reads the token and paging limits', () => {
    const config = loadSocrataConfig({
      SOCRATA_APP_TOKEN: 'test-token',
      SOCRATA_PAGE_SIZE: '100',
      SOCRATA_MAX_PAGES: '3',
      SOCRATA_RETRIES: '0'
    });
    expect(config.appToken).toBe('test-token');
    expect(config.pageSize).toBe(100);
    expect(config.maxPages).toBe(3);
    expect(config.retries).toBe(0);
    expect(config.domain).toBe(DEFAULT_SOCRATA_CONFIG.domain);
  });

  it('treats a blank token as absent', () => {
    expect(loadSocrataConfig({ SOCRATA_APP_TOKEN: '  ' }).appToken).toBeNull();
  });
});

describe('loadStorageConfig', () => {
  it('reads the blob pathname and sample fallback flag', () => {
    expect(loadStorageConfig({ ELP_BLOB_PATHNAME: 'dash/elp.json', ELP_ALLOW_SAMPLE_FALLBACK: '1' })).toEqual({
      blobPathname: 'dash/elp.json',
      allowSampleFallback: true
    });
    expect(loadStorageConfig({}).allowSampleFallback).toBe(false);
  });
});
