import path from 'path';
import fs from 'fs/promises';
import { loadConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/errors.js';
import { makeTempDir } from '../../helpers/cluster.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('writes defaults on first run', async () => {
    const file = path.join(tmpDir, 'nested', 'config.yaml');
    const result = loadConfig(file);
    expect(result.firstRun).toBe(true);
    expect(result.config.cluster_name).toBe('hadoop');
    expect(result.config.timeouts.hdfs_ready_seconds).toBe(400);
    expect(await fs.readFile(file, 'utf-8')).toContain('cluster_name: hadoop\n');
  });

  it('reads back the defaults it wrote', () => {
    const file = path.join(tmpDir, 'config.yaml');
    const first = loadConfig(file);
    const second = loadConfig(file);
    expect(second.firstRun).toBe(false);
    expect(second.config).toEqual(first.config);
  });

  it('fills in defaults for a partial file', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'cluster_name: prod\ntimeouts:\n  poll_interval_seconds: 5\n');
    const { config } = loadConfig(file);
    expect(config.cluster_name).toBe('prod');
    expect(config.timeouts.poll_interval_seconds).toBe(5);
    expect(config.timeouts.restart_delay_seconds).toBe(30);
    expect(config.safety.confirmation_threshold).toBe('high');
  });

  it('treats an empty file as all defaults', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, '');
    expect(loadConfig(file).config.node_id).toBeNull();
  });

  it('rejects invalid values', async () => {
    const file = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(file, 'safety:\n  confirmation_threshold: extreme\n');
    expect(() => loadConfig(file)).toThrow(ConfigError);
    await fs.writeFile(file, 'cluster_name: [unclosed\n');
    expect(() => loadConfig(file)).toThrow(`Failed to parse ${file}`);
  });
});
