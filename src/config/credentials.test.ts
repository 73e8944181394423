import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  homeFile: vi.fn(() => '/mock/.fleet-metrics/credentials.json'),
  prepareHomeFile: vi.fn(() => '/mock/.fleet-metrics/credentials.json'),
}));

import {
  resolveGitHubCredentials,
  requireGitHubCredentials,
  writeCredentials,
  hasGitHubCredentials,
} from './credentials.js';
import { ConfigError } from './fleet-config.js';
import { existsSync, readFileSync, writeFileSync, chmodSync } from 'node:fs';

describe('credentials', () => {
  let savedToken: string | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    savedToken = process.env['GITHUB_TOKEN'];
    delete process.env['GITHUB_TOKEN'];
    vi.mocked(existsSync).mockReturnValue(false);
  });

  afterEach(() => {
    if (savedToken === undefined) {
      delete process.env['GITHUB_TOKEN'];
    } else {
      process.env['GITHUB_TOKEN'] = savedToken;
    }
  });

  describe('resolveGitHubCredentials', () => {
    it('returns null when no credentials available', () => {
      expect(resolveGitHubCredentials()).toBeNull();
    });

    it('resolves from GITHUB_TOKEN env var', () => {
      process.env['GITHUB_TOKEN'] = 'test-token';
      expect(resolveGitHubCredentials()).toEqual({ token: 'test-token' });
    });

    it('resolves from credentials file when env var not set', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'file-token' });
    });

    it('env var takes precedence over file', () => {
      process.env['GITHUB_TOKEN'] = 'env-token';
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: 'file-token' } }));

      expect(resolveGitHubCredentials()).toEqual({ token: 'env-token' });
    });

    it('ignores a credentials file that is not valid JSON', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue('{ not json');

      expect(resolveGitHubCredentials()).toBeNull();
    });

    it('ignores an empty token in the file', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(JSON.stringify({ github: { token: '' } }));

      expect(resolveGitHubCredentials()).toBeNull();
    });
  });

  describe('requireGitHubCredentials', () => {
    it('throws ConfigError naming both sources when missing', () => {
      expect(() => requireGitHubCredentials()).toThrow(ConfigError);
      expect(() => requireGitHubCredentials()).toThrow(
        'No GitHub token found. Set GITHUB_TOKEN or add one to /mock/.fleet-metrics/credentials.json'
      );
    });

    it('returns the token when present', () => {
      process.env['GITHUB_TOKEN'] = 'test-token';
      expect(requireGitHubCredentials()).toEqual({ token: 'test-token' });
    });
  });

  describe('writeCredentials', () => {
    it('writes file with 600 permissions', () => {
      writeCredentials({ github: { token: 'test' } });

      expect(writeFileSync).toHaveBeenCalledWith(
        '/mock/.fleet-metrics/credentials.json',
        expect.stringContaining('"token": "test"'),
        'utf-8'
      );
      expect(chmodSync).toHaveBeenCalledWith('/mock/.fleet-metrics/credentials.json', 0o600);
    });
  });

  describe('hasGitHubCredentials', () => {
    it('returns false when missing', () => {
      expect(hasGitHubCredentials()).toBe(false);
    });

    it('returns true with env var', () => {
      process.env['GITHUB_TOKEN'] = 'tok';
      expect(hasGitHubCredentials()).toBe(true);
    });
  });
});
