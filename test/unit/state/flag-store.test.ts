import path from 'path';
import fs from 'fs/promises';
import { FlagStore } from '../../../src/state/flag-store.js';
import { ConfigError } from '../../../src/errors.js';
import { makeTempDir } from '../../helpers/cluster.js';

describe('FlagStore', () => {
  let tmpDir: string;
  let file: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    file = path.join(tmpDir, 'state', 'state.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = await FlagStore.open(file);
    expect(store.snapshot()).toEqual({});
    expect(store.path).toBe(file);
  });

  it('persists values across reopen', async () => {
    const store = await FlagStore.open(file);
    await store.set('hadoop.base.installed', true);
    await store.set('java.home', '/usr/lib/jvm/java-8');
    const reopened = await FlagStore.open(file);
    expect(reopened.flag('hadoop.base.installed')).toBe(true);
    expect(reopened.getString('java.home')).toBe('/usr/lib/jvm/java-8');
  });

  it('treats only a stored true as a set flag', async () => {
    const store = await FlagStore.open(file);
    await store.update({ a: 'true', b: 1, c: true });
    expect(store.flag('a')).toBe(false);
    expect(store.flag('b')).toBe(false);
    expect(store.flag('c')).toBe(true);
    expect(store.getString('b')).toBe('1');
  });

  it('handles prefixed ranges', async () => {
    const store = await FlagStore.open(file);
    await store.update({ '10.0.0.1': 'nn1', '10.0.0.2': 'nn2' }, 'etc_host.');
    await store.set('other', 'x');
    expect(store.getRange('etc_host.')).toEqual({ '10.0.0.1': 'nn1', '10.0.0.2': 'nn2' });
    await store.unsetRange(['10.0.0.1'], 'etc_host.');
    expect(store.getRange('etc_host.')).toEqual({ '10.0.0.2': 'nn2' });
    expect(store.get('other')).toBe('x');
  });

  it('unsets a key', async () => {
    const store = await FlagStore.open(file);
    await store.set('k', 1);
    await store.unset('k');
    expect(store.get('k')).toBeUndefined();
    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({});
  });

  it('runs a one-time operation once', async () => {
    const store = await FlagStore.open(file);
    const op = jest.fn().mockResolvedValue(undefined);
    expect(await store.runOnce('hdfs.namenode.formatted', op)).toBe(true);
    expect(await store.runOnce('hdfs.namenode.formatted', op)).toBe(false);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('leaves the flag unset when the operation fails', async () => {
    const store = await FlagStore.open(file);
    await expect(store.runOnce('once', async () => {
      throw new Error('failed');
    })).rejects.toThrow('failed');
    expect(store.flag('once')).toBe(false);
  });

  it('rejects a corrupt file', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, '{not json');
    await expect(FlagStore.open(file)).rejects.toThrow(ConfigError);
    await fs.writeFile(file, '[1, 2]');
    await expect(FlagStore.open(file)).rejects.toThrow(`State file ${file} must contain a JSON object`);
  });

  it('skips non-scalar entries', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify({ keep: 'yes', nested: { a: 1 } }));
    const store = await FlagStore.open(file);
    expect(store.snapshot()).toEqual({ keep: 'yes' });
  });
});
