/**
 * Registry Manager
 *
 * Owns independently loadable registries by name. Two names are reserved for
 * the bundled default registries (standard-length and short-text), which load
 * themselves on first request; concurrent first requests share one load.
 */

import { join, resolve } from 'node:path';
import { CONFIG } from '../config';
import { ReservedNameError } from './errors';
import { createLogger } from './logger';
import { ProfileRegistry } from './registry';

const log = createLogger('RegistryManager');

/** Directory of the bundled profile sets (package root /profiles) */
export const BUNDLED_PROFILE_ROOT = resolve(__dirname, '..', '..', 'profiles');

const RESERVED_NAMES: ReadonlySet<string> = new Set([
  CONFIG.registry.defaultName,
  CONFIG.registry.shortTextName,
]);

export interface RegistryManagerOptions {
  /** Directory holding the standard/ and short/ profile sets */
  profileRoot?: string;
}

export class RegistryManager {
  private readonly registries = new Map<string, ProfileRegistry>();
  private readonly pending = new Map<string, Promise<ProfileRegistry>>();
  private readonly profileRoot: string;

  constructor(options: RegistryManagerOptions = {}) {
    this.profileRoot = options.profileRoot ?? BUNDLED_PROFILE_ROOT;
  }

  static isReservedName(name: string): boolean {
    return RESERVED_NAMES.has(name);
  }

  /**
   * Existing registry for a name, or a new empty one
   */
  getOrCreateRegistry(name: string): ProfileRegistry {
    if (name.length === 0) {
      throw new RangeError('Registry name must not be empty');
    }
    if (RegistryManager.isReservedName(name)) {
      throw new ReservedNameError(name);
    }
    return this.obtain(name);
  }

  /**
   * Registry of the bundled standard-length profiles
   */
  getDefaultRegistry(): Promise<ProfileRegistry> {
    return this.getBundled(CONFIG.registry.defaultName, CONFIG.registry.defaultProfileDir);
  }

  /**
   * Registry of the bundled short-text profiles
   */
  getDefaultShortTextRegistry(): Promise<ProfileRegistry> {
    return this.getBundled(CONFIG.registry.shortTextName, CONFIG.registry.shortTextProfileDir);
  }

  has(name: string): boolean {
    return this.registries.has(name);
  }

  names(): string[] {
    return Array.from(this.registries.keys());
  }

  /**
   * Tear down one registry. Detectors already created keep working.
   */
  delete(name: string): boolean {
    const registry = this.registries.get(name);
    if (!registry) return false;
    registry.clear();
    this.registries.delete(name);
    this.pending.delete(name);
    return true;
  }

  /**
   * Tear down every registry, default ones included
   */
  clear(): void {
    for (const registry of this.registries.values()) {
      registry.clear();
    }
    this.registries.clear();
    this.pending.clear();
  }

  private obtain(name: string): ProfileRegistry {
    let registry = this.registries.get(name);
    if (!registry) {
      registry = new ProfileRegistry(name);
      this.registries.set(name, registry);
      log.debug(`Created registry "${name}"`);
    }
    return registry;
  }

  private getBundled(name: string, directory: string): Promise<ProfileRegistry> {
    const registry = this.obtain(name);
    if (registry.size > 0) return Promise.resolve(registry);

    const inFlight = this.pending.get(name);
    if (inFlight) return inFlight;

    const path = join(this.profileRoot, directory);
    const load = registry
      .loadFromDirectory(path)
      .then(() => {
        log.info(`Default registry "${name}" ready`, { languages: registry.size });
        return registry;
      })
      .catch((error: unknown) => {
        // Leave the registry empty so the next request retries the load
        registry.clear();
        throw error;
      })
      .finally(() => {
        if (this.pending.get(name) === load) this.pending.delete(name);
      });

    this.pending.set(name, load);
    return load;
  }
}
