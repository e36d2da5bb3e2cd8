import { loadConfig } from '../config';
import { AppConfig } from '../types';
import { errorMessage } from '../errors';
import { getConfigPath } from '../utils/paths';

export interface CheckOptions {
  config?: string;
}

/**
 * Validate the config file and print what the proxy would run with.
 */
export async function checkCommand(options: CheckOptions): Promise<void> {
  const configPath = getConfigPath(options.config);

  let config: AppConfig;
  try {
    config = await loadConfig(configPath);
  } catch (e) {
    console.error(`Config invalid: ${errorMessage(e)}`);
    process.exitCode = 1;
    return;
  }

  const { circuitBreaker, rateLimit } = config.failover;
  console.log(`Config OK: ${configPath}`);
  console.log(`  Port:             ${config.port}`);
  console.log(`  Debug:            ${config.debug}`);
  console.log(`  Timeout:          ${config.retry.timeoutSeconds}s`);
  console.log(
    `  Circuit breaker:  ${circuitBreaker.failureThreshold} failures, ` +
      `${circuitBreaker.openTimeoutSeconds}s open, ${circuitBreaker.halfOpenRequests} half-open trial(s)`,
  );
  console.log(`  Rate limit:       ${rateLimit.cooldownSeconds}s cooldown`);
  console.log(`  Backends:`);
  for (const b of config.backends) {
    const model = b.model ? `, model ${b.model}` : '';
    console.log(`    - ${b.name} [${b.enabled ? 'enabled' : 'disabled'}] ${b.platform} ${b.baseUrl}${model}`);
  }

  if (!config.backends.some((b) => b.enabled)) {
    console.warn('Warning: no backend is enabled; every request will get 502');
  }
}
