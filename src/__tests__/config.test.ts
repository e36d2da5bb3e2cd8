import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, backupTimestamp, loadConfig, parseConfig } from '../config';
import { BackendNotFoundError, BackendStateError, ConfigError } from '../errors';
import { configFile } from './fixtures/backends';

describe('parseConfig', () => {
  it('maps the file onto the app config', () => {
    const config = parseConfig(configFile);

    expect(config).toEqual({
      port: 9090,
      debug: true,
      adminToken: 'test-admin-token',
      backends: [
        {
          name: 'primary',
          baseUrl: 'https://primary.example.com',
          token: 'test-token-primary',
          enabled: true,
          platform: 'anthropic',
        },
        {
          name: 'chat',
          baseUrl: 'https://chat.example.com/api',
          token: 'test-token-chat',
          enabled: false,
          model: 'gpt-4o-mini',
          platform: 'openai',
        },
      ],
      retry: { timeoutSeconds: 10 },
      failover: {
        circuitBreaker: { failureThreshold: 2, openTimeoutSeconds: 15, halfOpenRequests: 2 },
        rateLimit: { cooldownSeconds: 45 },
      },
    });
  });

  it('fills in defaults for missing values', () => {
    const config = parseConfig({
      backends: [{ name: 'only', base_url: 'https://only.example.com' }],
    });

    expect(config.port).toBe(8080);
    expect(config.debug).toBe(false);
    expect(config.adminToken).toBeUndefined();
    expect(config.retry.timeoutSeconds).toBe(30);
    expect(config.failover).toEqual({
      circuitBreaker: { failureThreshold: 3, openTimeoutSeconds: 30, halfOpenRequests: 1 },
      rateLimit: { cooldownSeconds: 60 },
    });
    expect(config.backends[0]).toEqual({
      name: 'only',
      baseUrl: 'https://only.example.com',
      token: '',
      enabled: false,
      platform: 'anthropic',
    });
  });

  it('treats zero as missing', () => {
    const config = parseConfig({
      port: 0,
      backends: [{ name: 'only', base_url: 'https://only.example.com' }],
      retry: { timeout_seconds: 0 },
      failover: {
        circuit_breaker: { failure_threshold: 0, open_timeout_seconds: 0, half_open_requests: 0 },
        rate_limit: { cooldown_seconds: 0 },
      },
    });

    expect(config.port).toBe(8080);
    expect(config.retry.timeoutSeconds).toBe(30);
    expect(config.failover.circuitBreaker).toEqual({
      failureThreshold: 3,
      openTimeoutSeconds: 30,
      halfOpenRequests: 1,
    });
    expect(config.failover.rateLimit.cooldownSeconds).toBe(60);
  });

  it('requires at least one backend', () => {
    expect(() => parseConfig({ backends: [] })).toThrow(
      new ConfigError('invalid config: backends: at least one backend is required'),
    );
    expect(() => parseConfig({})).toThrow(ConfigError);
  });

  it('names the offending field', () => {
    expect(() =>
      parseConfig({ backends: [{ name: 'bad', base_url: 'not a url' }] }),
    ).toThrow('backends.0.base_url: base_url must be an absolute URL');

    expect(() =>
      parseConfig({
        backends: [{ name: 'bad', base_url: 'https://x.example.com', platform: 'gemini' }],
      }),
    ).toThrow(/backends\.0\.platform/);

    expect(() =>
      parseConfig({ port: -1, backends: [{ name: 'a', base_url: 'https://a.example.com' }] }),
    ).toThrow(/port/);
  });

  it('rejects duplicate backend names', () => {
    expect(() =>
      parseConfig({
        backends: [
          { name: 'same', base_url: 'https://a.example.com' },
          { name: 'same', base_url: 'https://b.example.com' },
        ],
      }),
    ).toThrow("invalid config: duplicate backend name 'same'");
  });
});

describe('backupTimestamp', () => {
  it('formats local time as YYYYMMDD-HHmmss', () => {
    expect(backupTimestamp(new Date(2025, 0, 2, 3, 4, 5))).toBe('20250102-030405');
    expect(backupTimestamp(new Date(2024, 11, 31, 23, 59, 58))).toBe('20241231-235958');
  });
});

describe('config files', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'failover-proxy-config-'));
    configPath = path.join(dir, 'config.json');
    await fs.writeFile(configPath, JSON.stringify(configFile, null, 2), 'utf-8');
  });

  afterEach(async () => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function readJson(file: string): Promise<{ backends: Array<{ name: string; enabled: boolean }> }> {
    return JSON.parse(await fs.readFile(file, 'utf-8'));
  }

  describe('loadConfig', () => {
    it('reads and validates a file', async () => {
      const config = await loadConfig(configPath);
      expect(config.port).toBe(9090);
      expect(config.backends.map((b) => b.name)).toEqual(['primary', 'chat']);
    });

    it('fails on a missing file', async () => {
      await expect(loadConfig(path.join(dir, 'missing.json'))).rejects.toThrow(/failed to read config/);
    });

    it('fails on invalid JSON', async () => {
      await fs.writeFile(configPath, '{ not json', 'utf-8');
      await expect(loadConfig(configPath)).rejects.toThrow(/failed to parse config/);
    });
  });

  describe('ConfigManager', () => {
    it('refuses access before load', () => {
      const manager = new ConfigManager(configPath);
      expect(() => manager.getConfig()).toThrow('config not loaded');
    });

    it('lists backends and their state', async () => {
      const manager = new ConfigManager(configPath);
      await manager.load();

      expect(manager.getBackendNames()).toEqual(['primary', 'chat']);
      expect(manager.isBackendEnabled('primary')).toBe(true);
      expect(manager.isBackendEnabled('chat')).toBe(false);
    });

    it('hands out copies of the config', async () => {
      const manager = new ConfigManager(configPath);
      await manager.load();

      const copy = manager.getConfig();
      copy.backends[0].enabled = false;
      copy.failover.circuitBreaker.failureThreshold = 99;

      expect(manager.isBackendEnabled('primary')).toBe(true);
      expect(manager.getConfig().failover.circuitBreaker.failureThreshold).toBe(2);
    });

    it('persists a toggle and keeps a backup of the previous file', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date(2025, 5, 1, 12, 0, 0));

      const manager = new ConfigManager(configPath);
      await manager.load();
      await manager.enableBackend('chat');

      expect(manager.isBackendEnabled('chat')).toBe(true);

      const saved = await readJson(configPath);
      expect(saved.backends.map((b) => b.enabled)).toEqual([true, true]);
      expect(await loadConfig(configPath)).toEqual(manager.getConfig());

      const backups = await fs.readdir(path.join(dir, 'backups'));
      expect(backups).toEqual(['config.20250601-120000.json']);
      const backup = await readJson(path.join(dir, 'backups', backups[0]));
      expect(backup.backends.map((b) => b.enabled)).toEqual([true, false]);

      await expect(fs.access(`${configPath}.tmp`)).rejects.toThrow();
    });

    it('keeps only the five newest backups', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      const manager = new ConfigManager(configPath);
      await manager.load();

      for (let i = 0; i < 7; i++) {
        vi.setSystemTime(new Date(2025, 5, 1, 12, 0, i));
        if (i % 2 === 0) {
          await manager.enableBackend('chat');
        } else {
          await manager.disableBackend('chat');
        }
      }

      const backups = (await fs.readdir(path.join(dir, 'backups'))).sort();
      expect(backups).toEqual([
        'config.20250601-120002.json',
        'config.20250601-120003.json',
        'config.20250601-120004.json',
        'config.20250601-120005.json',
        'config.20250601-120006.json',
      ]);
    });

    it('rejects unknown backends and no-op toggles', async () => {
      const manager = new ConfigManager(configPath);
      await manager.load();

      await expect(manager.enableBackend('nope')).rejects.toThrow(BackendNotFoundError);
      await expect(manager.enableBackend('nope')).rejects.toThrow("backend 'nope' not found");
      await expect(manager.enableBackend('primary')).rejects.toThrow(BackendStateError);
      await expect(manager.disableBackend('chat')).rejects.toThrow("backend 'chat' is already disabled");
    });

    it('reverts the flag when the write fails', async () => {
      const manager = new ConfigManager(configPath);
      await manager.load();
      await fs.rm(configPath);

      await expect(manager.disableBackend('primary')).rejects.toThrow(/failed to persist config/);
      expect(manager.isBackendEnabled('primary')).toBe(true);
    });

    it('serializes concurrent toggles', async () => {
      const manager = new ConfigManager(configPath);
      await manager.load();

      await Promise.all([manager.enableBackend('chat'), manager.disableBackend('primary')]);

      const saved = await readJson(configPath);
      expect(saved.backends.map((b) => b.enabled)).toEqual([false, true]);
    });
  });
});
