import { getServerConfig, type ServerConfig } from './config.js';
import { createDefaultRegistry } from './providers/index.js';
import type { ProviderRegistry } from './providers/registry.js';
import { setLogLevel } from './utils/logger.js';

/**
 * Everything a host surface needs to run matches.
 */
export interface AppContext {
  registry: ProviderRegistry;
  config: ServerConfig;
}

export function createAppContext(env: Record<string, string | undefined> = process.env): AppContext {
  const config = getServerConfig(env);
  setLogLevel(config.logLevel);
  return { registry: createDefaultRegistry(), config };
}
