/**
 * tally Configuration Management
 *
 * The config file is read as a whole into a snapshot and written back as a
 * whole. Conf writes through a temp file and renames it into place, so a
 * reader never sees half of an update.
 *
 * @purpose Global tally configuration in the XDG config directory
 */

import Conf from 'conf'
import { TALLY_PATHS } from './paths.js'

export type ConfigValues = Record<string, unknown>

/**
 * Immutable view of the config file at the moment it was loaded
 */
export interface ConfigSnapshot {
  readonly values: Readonly<ConfigValues>
}

export type ConfigPatch = Readonly<ConfigValues>

export interface ConfigStoreOptions {
  cwd?: string
  configName?: string
}

export class ConfigStore {
  private conf: Conf<ConfigValues>

  constructor(options: ConfigStoreOptions = {}) {
    this.conf = new Conf<ConfigValues>({
      projectName: 'tally',
      cwd: options.cwd ?? TALLY_PATHS.config,
      configName: options.configName ?? 'config',
    })
  }

  get path(): string {
    return this.conf.path
  }

  /**
   * Read the backing file. Every call hits the disk.
   */
  load(): ConfigSnapshot {
    return { values: Object.freeze({ ...this.conf.store }) }
  }

  /**
   * Merge a patch over a snapshot and flush it in a single write.
   * Keys the patch does not name keep the snapshot's values.
   */
  apply(snapshot: ConfigSnapshot, patch: ConfigPatch): ConfigSnapshot {
    const next: ConfigValues = { ...snapshot.values, ...patch }
    this.conf.store = next
    return { values: Object.freeze(next) }
  }
}

export function getString(snapshot: ConfigSnapshot, key: string): string | null {
  const value = snapshot.values[key]
  return typeof value === 'string' && value.length > 0 ? value : null
}
