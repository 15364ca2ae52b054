import { describe, it, expect } from 'vitest';
import { loadConfig, ZOOM_MAX_RECORDS_PER_CALL } from './index.js';

describe('loadConfig', () => {
  it('reads the Zoom settings from the environment', () => {
    const config = loadConfig({
      ZOOM_API_KEY: ' test-key ',
      ZOOM_API_SECRET: 'test-secret',
      ZOOM_RECYCLE_LICENSES: 'TRUE',
      ZOOM_LICENSES_COUNT: '40',
      ZOOM_TIMEZONE: 'Europe/Berlin',
      ZOOM_MAX_RECORDS_PER_CALL: '100'
    });

    expect(config.zoom).toEqual({
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      baseUrl: 'https://api.zoom.us/v2/',
      recycleLicenses: true,
      licensesCount: 40,
      timezone: 'Europe/Berlin',
      maxRecordsPerCall: 100
    });
  });

  it('does not throw when settings are missing', () => {
    const config = loadConfig({});

    expect(config.zoom).toEqual({
      apiKey: '',
      apiSecret: '',
      baseUrl: 'https://api.zoom.us/v2/',
      recycleLicenses: false,
      licensesCount: undefined,
      timezone: undefined,
      maxRecordsPerCall: ZOOM_MAX_RECORDS_PER_CALL
    });
  });

  it('ignores a license count that is not a number', () => {
    expect(loadConfig({ ZOOM_LICENSES_COUNT: 'ten' }).zoom.licensesCount).toBeUndefined();
    expect(loadConfig({ ZOOM_RECYCLE_LICENSES: 'no' }).zoom.recycleLicenses).toBe(false);
  });
});
