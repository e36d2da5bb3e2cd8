import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { AppConfig, Backend } from './types';
import { BackendNotFoundError, BackendStateError, ConfigError, errorMessage } from './errors';
import { Logger, createLogger } from './utils/logger';

export const DEFAULT_PORT = 8080;
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_FAILURE_THRESHOLD = 3;
export const DEFAULT_OPEN_TIMEOUT_SECONDS = 30;
export const DEFAULT_HALF_OPEN_REQUESTS = 1;
export const DEFAULT_COOLDOWN_SECONDS = 60;

const MAX_BACKUPS = 5;
const BACKUP_DIR = 'backups';

/**
 * Zero or missing means "use the default".
 */
const withDefault = (fallback: number) =>
  z
    .number()
    .int()
    .nonnegative()
    .optional()
    .transform((v) => (v === undefined || v === 0 ? fallback : v));

const backendSchema = z.object({
  name: z.string().min(1, 'name is required'),
  base_url: z.string().url('base_url must be an absolute URL'),
  token: z.string().default(''),
  enabled: z.boolean().default(false),
  model: z.string().optional(),
  platform: z.enum(['anthropic', 'openai']).default('anthropic'),
});

const fileSchema = z.object({
  port: withDefault(DEFAULT_PORT),
  debug: z.boolean().default(false),
  admin_token: z.string().optional(),
  backends: z.array(backendSchema).min(1, 'at least one backend is required'),
  retry: z
    .object({ timeout_seconds: withDefault(DEFAULT_TIMEOUT_SECONDS) })
    .default({}),
  failover: z
    .object({
      circuit_breaker: z
        .object({
          failure_threshold: withDefault(DEFAULT_FAILURE_THRESHOLD),
          open_timeout_seconds: withDefault(DEFAULT_OPEN_TIMEOUT_SECONDS),
          half_open_requests: withDefault(DEFAULT_HALF_OPEN_REQUESTS),
        })
        .default({}),
      rate_limit: z
        .object({ cooldown_seconds: withDefault(DEFAULT_COOLDOWN_SECONDS) })
        .default({}),
    })
    .default({}),
});

export type ConfigFile = z.input<typeof fileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Validate a parsed JSON document and map it onto AppConfig.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`invalid config: ${formatIssues(result.error)}`);
  }

  const file = result.data;
  const seen = new Set<string>();
  for (const b of file.backends) {
    if (seen.has(b.name)) {
      throw new ConfigError(`invalid config: duplicate backend name '${b.name}'`);
    }
    seen.add(b.name);
  }

  return {
    port: file.port,
    debug: file.debug,
    ...(file.admin_token ? { adminToken: file.admin_token } : {}),
    backends: file.backends.map(
      (b): Backend => ({
        name: b.name,
        baseUrl: b.base_url,
        token: b.token,
        enabled: b.enabled,
        ...(b.model ? { model: b.model } : {}),
        platform: b.platform,
      }),
    ),
    retry: { timeoutSeconds: file.retry.timeout_seconds },
    failover: {
      circuitBreaker: {
        failureThreshold: file.failover.circuit_breaker.failure_threshold,
        openTimeoutSeconds: file.failover.circuit_breaker.open_timeout_seconds,
        halfOpenRequests: file.failover.circuit_breaker.half_open_requests,
      },
      rateLimit: {
        cooldownSeconds: file.failover.rate_limit.cooldown_seconds,
      },
    },
  };
}

/**
 * Load and validate configuration from a JSON file.
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (e) {
    throw new ConfigError(`failed to read config ${configPath}: ${errorMessage(e)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`failed to parse config ${configPath}: ${errorMessage(e)}`);
  }

  return parseConfig(raw);
}

/**
 * Inverse of parseConfig, used when persisting a toggle.
 */
export function serializeConfig(config: AppConfig): ConfigFile {
  return {
    port: config.port,
    debug: config.debug,
    ...(config.adminToken ? { admin_token: config.adminToken } : {}),
    backends: config.backends.map((b) => ({
      name: b.name,
      base_url: b.baseUrl,
      token: b.token,
      enabled: b.enabled,
      ...(b.model ? { model: b.model } : {}),
      platform: b.platform,
    })),
    retry: { timeout_seconds: config.retry.timeoutSeconds },
    failover: {
      circuit_breaker: {
        failure_threshold: config.failover.circuitBreaker.failureThreshold,
        open_timeout_seconds: config.failover.circuitBreaker.openTimeoutSeconds,
        half_open_requests: config.failover.circuitBreaker.halfOpenRequests,
      },
      rate_limit: {
        cooldown_seconds: config.failover.rateLimit.cooldownSeconds,
      },
    },
  };
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD-HHmmss.
 */
export function backupTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Owns the loaded configuration and persists enable/disable toggles.
 * Writes are serialized so two toggles never interleave on disk.
 */
export class ConfigManager {
  private config: AppConfig | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    private readonly configPath: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger();
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<AppConfig> {
    this.config = await loadConfig(this.configPath);
    this.logger.info('config.load', `Loaded ${this.config.backends.length} backends`, {
      path: this.configPath,
      enabled: this.config.backends.filter((b) => b.enabled).length,
    });
    return this.getConfig();
  }

  private current(): AppConfig {
    if (!this.config) {
      throw new ConfigError('config not loaded');
    }
    return this.config;
  }

  /**
   * Deep copy of the current configuration.
   */
  getConfig(): AppConfig {
    const config = this.current();
    return {
      ...config,
      backends: config.backends.map((b) => ({ ...b })),
      retry: { ...config.retry },
      failover: {
        circuitBreaker: { ...config.failover.circuitBreaker },
        rateLimit: { ...config.failover.rateLimit },
      },
    };
  }

  getBackendNames(): string[] {
    return this.current().backends.map((b) => b.name);
  }

  isBackendEnabled(name: string): boolean {
    return this.findBackend(name).enabled;
  }

  enableBackend(name: string): Promise<void> {
    return this.setEnabled(name, true);
  }

  disableBackend(name: string): Promise<void> {
    return this.setEnabled(name, false);
  }

  private findBackend(name: string): Backend {
    const backend = this.current().backends.find((b) => b.name === name);
    if (!backend) {
      throw new BackendNotFoundError(name);
    }
    return backend;
  }

  private async setEnabled(name: string, enabled: boolean): Promise<void> {
    const backend = this.findBackend(name);
    if (backend.enabled === enabled) {
      throw new BackendStateError(
        `backend '${name}' is already ${enabled ? 'enabled' : 'disabled'}`,
      );
    }

    backend.enabled = enabled;
    const snapshot = serializeConfig(this.current());

    const write = this.writeChain.then(() => this.persist(snapshot));
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.writeChain = write.catch((e: unknown) => {
      this.logger.debug('config.persist', 'Previous write failed', { error: errorMessage(e) });
    });

    try {
      await write;
    } catch (e) {
      backend.enabled = !enabled;
      this.logger.error('config.persist', `Failed to persist config for ${name}`, {
        backend: name,
        error: errorMessage(e),
      });
      throw new ConfigError(`failed to persist config: ${errorMessage(e)}`);
    }

    this.logger.info('config.persist', `${name} ${enabled ? 'enabled' : 'disabled'} and saved`, {
      backend: name,
      path: this.configPath,
    });
  }

  private async persist(snapshot: ConfigFile): Promise<void> {
    await this.backup();

    const tmpPath = `${this.configPath}.tmp`;
    await fs.writeFile(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');
    await fs.rename(tmpPath, this.configPath);
  }

  private async backup(): Promise<void> {
    const backupDir = path.join(path.dirname(this.configPath), BACKUP_DIR);
    await fs.mkdir(backupDir, { recursive: true });

    const target = path.join(backupDir, `config.${backupTimestamp()}.json`);
    await fs.copyFile(this.configPath, target);

    const entries = await fs.readdir(backupDir);
    const backups = entries
      .filter((f) => f.startsWith('config.') && f.endsWith('.json'))
      .sort()
      .reverse();

    for (const stale of backups.slice(MAX_BACKUPS)) {
      await fs.unlink(path.join(backupDir, stale));
    }
  }
}
