import { describe, expect, it } from 'vitest';
import { loadPlatformSettings } from '../config/env';
import { ConfigError } from '../utils/errors';

describe('loadPlatformSettings', () => {
  it('reads CML_* variables and applies defaults', () => {
    const settings = loadPlatformSettings({
      CML_HOST: 'https://ml.example.com/',
      CML_API_KEY: 'test-key',
      CML_PROJECT_ID: 'proj-1',
    });

    expect(settings).toEqual({
      host: 'https://ml.example.com',
      apiKey: 'test-key',
      projectId: 'proj-1',
      timeoutMs: 30000,
      pageSize: 100,
    });
  });

  it('falls back to the in-session CDSW_* variables', () => {
    const settings = loadPlatformSettings({
      CDSW_DOMAIN: 'ml.example.com',
      CDSW_APIV2_KEY: 'session-key',
      CDSW_PROJECT_ID: 'proj-2',
      CML_API_TIMEOUT_MS: '5000',
      CML_API_PAGE_SIZE: '25',
    });

    expect(settings).toEqual({
      host: 'https://ml.example.com',
      apiKey: 'session-key',
      projectId: 'proj-2',
      timeoutMs: 5000,
      pageSize: 25,
    });
  });

  it('lets explicit arguments override the environment', () => {
    const settings = loadPlatformSettings(
      { CML_HOST: 'https://env.example.com', CML_API_KEY: 'env-key', CML_PROJECT_ID: 'env-proj' },
      { host: 'https://cli.example.com', projectId: 'cli-proj' }
    );

    expect(settings.host).toBe('https://cli.example.com');
    expect(settings.apiKey).toBe('env-key');
    expect(settings.projectId).toBe('cli-proj');
  });

  it('names every missing setting', () => {
    try {
      loadPlatformSettings({ CML_API_KEY: '   ' });
      throw new Error('expected loadPlatformSettings to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          'host (CML_HOST)',
          'API key (CML_API_KEY)',
          'project id (CML_PROJECT_ID)',
        ]);
      }
    }
  });

  it('rejects a host that is not a URL', () => {
    expect(() =>
      loadPlatformSettings({ CML_HOST: 'ml.example.com', CML_API_KEY: 'k', CML_PROJECT_ID: 'p' })
    ).toThrow('Invalid platform host');
  });

  it('rejects an oversized page size', () => {
    expect(() =>
      loadPlatformSettings({
        CML_HOST: 'https://ml.example.com',
        CML_API_KEY: 'k',
        CML_PROJECT_ID: 'p',
        CML_API_PAGE_SIZE: '5000',
      })
    ).toThrow('Invalid platform environment');
  });
});
