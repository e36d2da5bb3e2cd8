import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createApp } from '../index';
import { maskToken } from '../admin';
import { ConfigManager } from '../config';
import { CircuitBreaker } from '../utils/circuit-breaker';
import { configFile } from './fixtures/backends';

interface StatusBody {
  backends: Array<{
    name: string;
    enabled: boolean;
    circuit_breaker: { state: string; consecutive_failures: number; last_failure_time: string | null };
    rate_limit: { cooldown_until: string | null; retry_after_seconds: number };
    last_error?: string;
  }>;
  count: number;
}

describe('maskToken', () => {
  it('keeps the first and last four characters', () => {
    expect(maskToken('test-token-primary')).toBe('test...mary');
    expect(maskToken('123456789')).toBe('1234...6789');
  });

  it('hides short tokens completely', () => {
    expect(maskToken('12345678')).toBe('****');
    expect(maskToken('')).toBe('****');
  });
});

describe('Management API', () => {
  let dir: string;
  let configPath: string;

  async function setup(file: object = { ...configFile, admin_token: undefined }) {
    await fs.writeFile(configPath, JSON.stringify(file), 'utf-8');
    const configManager = new ConfigManager(configPath);
    const config = await configManager.load();
    const breaker = new CircuitBreaker(config.backends, config.failover);
    const app = createApp({ configManager, breaker, config });
    return { app, breaker, configManager };
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'failover-proxy-admin-'));
    configPath = path.join(dir, 'config.json');
  });

  afterEach(async () => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('GET /health', () => {
    it('reports backend counts', async () => {
      const { app } = await setup();

      const res = await app.request('/health');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ status: 'healthy', total_backends: 2, enabled_backends: 1 });
      expect(typeof body.timestamp).toBe('string');
    });
  });

  describe('GET /backends', () => {
    it('lists backends with masked tokens', async () => {
      const { app } = await setup();

      const res = await app.request('/backends');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        backends: [
          {
            name: 'primary',
            base_url: 'https://primary.example.com',
            enabled: true,
            platform: 'anthropic',
            token_masked: 'test...mary',
          },
          {
            name: 'chat',
            base_url: 'https://chat.example.com/api',
            enabled: false,
            model: 'gpt-4o-mini',
            platform: 'openai',
            token_masked: 'test...chat',
          },
        ],
        count: 2,
      });
    });
  });

  describe('GET /backends/status', () => {
    it('reports circuit and rate limit state', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2025-03-01T10:00:00.000Z'));
      const { app, breaker } = await setup();

      const primary = breaker.findState('primary');
      if (!primary) throw new Error('missing state');
      // failure_threshold is 2 in the fixture
      breaker.recordFailure(primary, 500);
      breaker.recordFailure(primary, 503);
      breaker.record429(primary, '10');

      const res = await app.request('/backends/status');
      const body: StatusBody = await res.json();

      expect(body.count).toBe(2);
      expect(body.backends[0]).toEqual({
        name: 'primary',
        enabled: true,
        circuit_breaker: {
          state: 'open',
          consecutive_failures: 2,
          last_failure_time: '2025-03-01T10:00:00.000Z',
        },
        rate_limit: {
          cooldown_until: '2025-03-01T10:00:45.000Z',
          retry_after_seconds: 45,
        },
        last_error: 'HTTP 503',
      });
      expect(body.backends[1]).toEqual({
        name: 'chat',
        enabled: false,
        circuit_breaker: { state: 'closed', consecutive_failures: 0, last_failure_time: null },
        rate_limit: { cooldown_until: null, retry_after_seconds: 0 },
      });
    });
  });

  describe('enable / disable', () => {
    it('enables a backend, persists it and tells the breaker', async () => {
      const { app, breaker, configManager } = await setup();

      const res = await app.request('/backend/chat/enable', { method: 'POST' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, message: "Backend 'chat' has been enabled" });
      expect(configManager.isBackendEnabled('chat')).toBe(true);
      expect(breaker.sortBackendsByPriority().map((s) => s.backend.name)).toEqual(['primary', 'chat']);

      const saved = JSON.parse(await fs.readFile(configPath, 'utf-8'));
      expect(saved.backends[1].enabled).toBe(true);
    });

    it('disables a backend with GET as well', async () => {
      const { app, breaker } = await setup();

      const res = await app.request('/backend/primary/disable');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, message: "Backend 'primary' has been disabled" });
      expect(breaker.sortBackendsByPriority()).toEqual([]);
    });

    it('returns 400 for an unknown backend', async () => {
      const { app } = await setup();

      const res = await app.request('/backend/nope/enable', { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Failed to enable backend',
        message: "backend 'nope' not found",
      });
    });

    it('returns 400 when the backend is already in that state', async () => {
      const { app } = await setup();

      const res = await app.request('/backend/primary/enable', { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Failed to enable backend',
        message: "backend 'primary' is already enabled",
      });
    });
  });

  describe('admin token', () => {
    it('rejects requests without the token', async () => {
      const { app } = await setup(configFile);

      const res = await app.request('/backends');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'Unauthorized',
        message: 'Invalid or missing admin token',
      });
    });

    it('accepts a bearer token', async () => {
      const { app } = await setup(configFile);

      const res = await app.request('/backends', {
        headers: { Authorization: 'Bearer test-admin-token' },
      });

      expect(res.status).toBe(200);
    });

    it('accepts the token as a query parameter', async () => {
      const { app } = await setup(configFile);

      const res = await app.request('/health?token=test-admin-token');

      expect(res.status).toBe(200);
    });

    it('rejects a wrong token', async () => {
      const { app } = await setup(configFile);

      const res = await app.request('/backend/chat/enable', {
        method: 'POST',
        headers: { Authorization: 'Bearer wrong' },
      });

      expect(res.status).toBe(401);
    });
  });
});
