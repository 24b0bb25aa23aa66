/**
 * DutConfigStorage
 *
 * JSON file adapter for DUT configuration records supplied by an external
 * store. Records are validated on load; invalid ones are skipped with a warning.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import type { DutConfig } from '@shared/types/dut.types';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errors';
import { validateDutConfig } from './DutConfigValidator';

const CONFIG_FILENAME = 'dut-configs.json';

export class DutConfigStorage {
  private storagePath: string;
  private configsFile: string;

  constructor(storagePath: string) {
    this.storagePath = storagePath;
    this.configsFile = join(storagePath, CONFIG_FILENAME);
  }

  /**
   * Ensure storage directory exists
   */
  async ensureDirectory(): Promise<void> {
    try {
      await fs.mkdir(this.storagePath, { recursive: true });

      try {
        await fs.access(this.configsFile);
      } catch {
        await fs.writeFile(this.configsFile, JSON.stringify({ configs: {} }, null, 2));
      }
    } catch (error) {
      logger.error('Failed to ensure DUT configuration directory:', error);
      throw error;
    }
  }

  /**
   * Load all valid records, keyed by DUT name
   */
  async loadConfigs(): Promise<Record<string, DutConfig>> {
    const raw = await this.readRaw();
    const configs: Record<string, DutConfig> = {};
    for (const [key, value] of Object.entries(raw)) {
      try {
        const config = validateDutConfig(value);
        configs[config.name] = config;
      } catch (error) {
        logger.warn(`Skipping DUT configuration "${key}": ${getErrorMessage(error)}`);
      }
    }
    return configs;
  }

  async loadConfig(name: string): Promise<DutConfig | null> {
    const configs = await this.loadConfigs();
    return configs[name] ?? null;
  }

  async saveConfig(config: DutConfig): Promise<void> {
    try {
      const raw = await this.readRaw();
      raw[config.name] = config;
      await this.writeRaw(raw);
      logger.info(`DUT configuration saved: ${config.name}`);
    } catch (error) {
      logger.error('Failed to save DUT configuration:', error);
      throw error;
    }
  }

  async deleteConfig(name: string): Promise<void> {
    try {
      const raw = await this.readRaw();
      delete raw[name];
      await this.writeRaw(raw);
      logger.info(`DUT configuration deleted: ${name}`);
    } catch (error) {
      logger.error('Failed to delete DUT configuration:', error);
      throw error;
    }
  }

  /** Raw records; a missing or unreadable file reads as empty */
  private async readRaw(): Promise<Record<string, unknown>> {
    let data: string;
    try {
      data = await fs.readFile(this.configsFile, 'utf-8');
    } catch (error) {
      logger.warn(`DUT configuration file unavailable: ${getErrorMessage(error)}`);
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(data);
      if (typeof parsed === 'object' && parsed !== null && 'configs' in parsed) {
        const configs: unknown = parsed.configs;
        if (typeof configs === 'object' && configs !== null && !Array.isArray(configs)) {
          return { ...configs };
        }
      }
      logger.error(`${this.configsFile} has no "configs" object`);
    } catch (error) {
      logger.error(`Failed to parse ${this.configsFile}:`, error);
    }
    return {};
  }

  private async writeRaw(configs: Record<string, unknown>): Promise<void> {
    await fs.writeFile(this.configsFile, JSON.stringify({ configs }, null, 2));
  }
}
