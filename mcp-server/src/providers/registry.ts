import type { ProviderConfiguration } from '@colmatch/shared';
import { ProviderInitializationError, UnknownProviderError, ValidationError, errorMessage } from '../errors.js';
import { configurationFingerprint } from '../services/provider-configuration.js';
import { createLogger } from '../utils/logger.js';
import type { MatchingProvider, ProviderFactory, ProviderSummary } from './types.js';

const log = createLogger('registry');

interface CachedInstance {
  fingerprint: string;
  provider: MatchingProvider;
}

/**
 * Maps provider ids to ready provider instances.
 *
 * One instance is cached per provider id together with the fingerprint of
 * the configuration it was validated against. A different configuration
 * builds and validates a fresh instance that replaces the cached one;
 * callers already holding the old instance keep using it.
 */
export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();
  private readonly instances = new Map<string, CachedInstance>();

  /**
   * Register a factory, replacing any previous one and evicting its cached instances.
   */
  register(providerId: string, factory: ProviderFactory): this {
    this.factories.set(providerId, factory);
    this.evict(providerId);
    return this;
  }

  resolve(providerId: string, config: ProviderConfiguration): MatchingProvider {
    if (!providerId.trim()) {
      throw new ValidationError('providerId is required', { operation: 'resolve' });
    }

    const factory = this.factories.get(providerId);
    if (!factory) {
      throw new UnknownProviderError(providerId);
    }

    const fingerprint = configurationFingerprint(config);
    const cached = this.instances.get(providerId);
    if (cached?.fingerprint === fingerprint && cached.provider.isReady()) {
      return cached.provider;
    }

    let provider: MatchingProvider;
    try {
      provider = factory();
      provider.validateConfiguration(config);
    } catch (error) {
      throw new ProviderInitializationError(`Failed to create provider ${providerId}: ${errorMessage(error)}`, {
        providerId,
        operation: 'resolve',
        cause: error,
      });
    }

    this.instances.set(providerId, { fingerprint, provider });
    log.debug(`${cached ? 'Replaced' : 'Created'} provider instance ${providerId}`);
    return provider;
  }

  listAvailable(): string[] {
    return [...this.factories.keys()];
  }

  isAvailable(providerId: string): boolean {
    return this.factories.has(providerId);
  }

  /**
   * Identity and models of every registered backend, without configuring them.
   */
  describe(): ProviderSummary[] {
    return [...this.factories.entries()].map(([providerId, factory]) => {
      const probe = factory();
      return {
        providerId,
        displayName: probe.displayName(),
        supportedModels: [...probe.supportedModels()],
      };
    });
  }

  evict(providerId: string): void {
    this.instances.delete(providerId);
  }

  clear(): void {
    this.instances.clear();
  }

  get cachedInstanceCount(): number {
    return this.instances.size;
  }
}
