import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { DutConfigStorage } from './DutConfigStorage';
import { createDutConfig } from '../test/dutFactory';

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('DutConfigStorage', () => {
  let storage: DutConfigStorage;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `rfce-test-dutstorage-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    storage = new DutConfigStorage(tempDir);
    await storage.ensureDirectory();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('creates the storage directory and an empty file', async () => {
    const content = await fs.readFile(join(tempDir, 'dut-configs.json'), 'utf-8');
    expect(JSON.parse(content)).toEqual({ configs: {} });
  });

  it('does not overwrite existing records on re-initialization', async () => {
    await storage.saveConfig(createDutConfig());
    await storage.ensureDirectory();
    expect(await storage.loadConfig('LNA-2G4')).toEqual(createDutConfig());
  });

  it('saves, loads and deletes records by name', async () => {
    await storage.saveConfig(createDutConfig());
    await storage.saveConfig(createDutConfig({ name: 'PA-5G8' }));

    expect(Object.keys(await storage.loadConfigs()).sort()).toEqual(['LNA-2G4', 'PA-5G8']);

    await storage.deleteConfig('LNA-2G4');
    expect(await storage.loadConfig('LNA-2G4')).toBeNull();
    expect((await storage.loadConfig('PA-5G8'))?.name).toBe('PA-5G8');
  });

  it('skips records that fail validation', async () => {
    const file = join(tempDir, 'dut-configs.json');
    await fs.writeFile(file, JSON.stringify({ configs: { good: createDutConfig(), bad: { name: 'bad' } } }));
    expect(Object.keys(await storage.loadConfigs())).toEqual(['LNA-2G4']);
  });

  it('reads a corrupted file as empty', async () => {
    await fs.writeFile(join(tempDir, 'dut-configs.json'), '{ not json');
    expect(await storage.loadConfigs()).toEqual({});
  });

  it('reads a missing file as empty', async () => {
    await fs.rm(join(tempDir, 'dut-configs.json'));
    expect(await storage.loadConfigs()).toEqual({});
  });
});
