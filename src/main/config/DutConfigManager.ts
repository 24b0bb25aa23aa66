/**
 * DutConfigManager
 *
 * In-memory CRUD over DUT configuration records, optionally backed by
 * DutConfigStorage. Every change bumps the record's revision and emits
 * 'changed'; sessions compare revisions to detect stale snapshots.
 */

import { EventEmitter } from 'events';
import type { DutConfig, DutConfigMetadata, DutConfigUpdateInput, TestStage } from '@shared/types/dut.types';
import { TEST_STAGES } from '@shared/constants';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { DutConfigStorage } from './DutConfigStorage';
import { validateDutConfig } from './DutConfigValidator';

export type DutConfigChange = 'created' | 'updated' | 'deleted';

export interface DutConfigChangeEvent {
  name: string;
  change: DutConfigChange;
  revision: number;
}

interface StoredConfig {
  config: DutConfig;
  revision: number;
}

export class DutConfigManager extends EventEmitter {
  private configs = new Map<string, StoredConfig>();
  /** Revisions keep counting across delete and re-create */
  private revisions = new Map<string, number>();
  private storage: DutConfigStorage | null;

  constructor(storage: DutConfigStorage | null = null) {
    super();
    this.storage = storage;
  }

  /**
   * Load every stored record; without storage this is a no-op
   */
  async initialize(): Promise<void> {
    if (!this.storage) return;
    await this.storage.ensureDirectory();
    const configs = await this.storage.loadConfigs();
    for (const config of Object.values(configs)) {
      this.configs.set(config.name, { config, revision: this.nextRevision(config.name) });
    }
    logger.info(`DutConfigManager initialized with ${this.configs.size} configurations`);
  }

  /**
   * Add a new record
   * @throws ConfigurationError for an invalid record or a duplicate name
   */
  async createConfig(input: unknown): Promise<DutConfig> {
    const config = validateDutConfig(input);
    if (this.configs.has(config.name)) {
      throw new ConfigurationError(`DUT configuration "${config.name}" already exists`, config.name);
    }
    await this.storage?.saveConfig(config);
    return this.commit(config, 'created');
  }

  /**
   * Replace fields of an existing record; the result is validated as a whole
   */
  async updateConfig(name: string, updates: DutConfigUpdateInput): Promise<DutConfig> {
    const stored = this.require(name);
    const config = validateDutConfig({ ...stored.config, ...updates, name });
    await this.storage?.saveConfig(config);
    return this.commit(config, 'updated');
  }

  async deleteConfig(name: string): Promise<void> {
    this.require(name);
    await this.storage?.deleteConfig(name);
    this.configs.delete(name);
    const revision = this.nextRevision(name);
    logger.info(`DUT configuration deleted: ${name}`);
    this.emitChange({ name, change: 'deleted', revision });
  }

  getConfig(name: string): DutConfig | null {
    return this.configs.get(name)?.config ?? null;
  }

  /** Current revision, or null when the record does not exist */
  getRevision(name: string): number | null {
    return this.configs.get(name)?.revision ?? null;
  }

  listConfigs(): DutConfigMetadata[] {
    return [...this.configs.values()]
      .map(({ config, revision }) => ({
        name: config.name,
        partNumber: config.partNumber,
        enabledTests: [...config.enabledTests],
        stages: TEST_STAGES.filter((stage: TestStage) => config.requirements[stage] !== undefined),
        revision,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  onChange(listener: (event: DutConfigChangeEvent) => void): () => void {
    this.on('changed', listener);
    return () => {
      this.off('changed', listener);
    };
  }

  private commit(config: DutConfig, change: DutConfigChange): DutConfig {
    const revision = this.nextRevision(config.name);
    this.configs.set(config.name, { config, revision });
    logger.info(`DUT configuration ${change}: ${config.name} (revision ${revision})`);
    this.emitChange({ name: config.name, change, revision });
    return config;
  }

  private emitChange(event: DutConfigChangeEvent): void {
    this.emit('changed', event);
  }

  private nextRevision(name: string): number {
    const revision = (this.revisions.get(name) ?? 0) + 1;
    this.revisions.set(name, revision);
    return revision;
  }

  private require(name: string): StoredConfig {
    const stored = this.configs.get(name);
    if (!stored) {
      throw new ConfigurationError(`DUT configuration "${name}" not found`, name);
    }
    return stored;
  }
}
