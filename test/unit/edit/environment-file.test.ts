import path from 'path';
import fs from 'fs/promises';
import { editEnvironmentFile, parseEnvironment, readEtcEnv } from '../../../src/edit/environment-file.js';
import { makeTempDir } from '../../helpers/cluster.js';

describe('environment file editor', () => {
  let tmpDir: string;
  let file: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    file = path.join(tmpDir, 'environment');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('parses quoted and unquoted values, skipping comments and blank lines', () => {
    const env = parseEnvironment('# comment\n\nPATH="/usr/bin:/bin"\nLANG=C.UTF-8\nQUOTED=\' spaced \'\nnot a pair\n');
    expect([...env]).toEqual([
      ['PATH', '/usr/bin:/bin'],
      ['LANG', 'C.UTF-8'],
      ['QUOTED', 'spaced'],
    ]);
  });

  it('regenerates the file with every value double-quoted', async () => {
    await fs.writeFile(file, '# system defaults\nPATH=/usr/bin\nLANG="C"\n');
    await editEnvironmentFile(file, (env) => {
      env.set('JAVA_HOME', '/usr/lib/jvm/java-8');
      env.delete('LANG');
    });
    expect(await fs.readFile(file, 'utf-8')).toBe('PATH="/usr/bin"\nJAVA_HOME="/usr/lib/jvm/java-8"\n');
  });

  it('treats a missing file as empty', async () => {
    await editEnvironmentFile(file, (env) => {
      env.set('A', '1');
    });
    expect(await fs.readFile(file, 'utf-8')).toBe('A="1"\n');
  });

  it('still writes when the edit throws', async () => {
    await expect(editEnvironmentFile(file, (env) => {
      env.set('A', '1');
      throw new Error('fail');
    })).rejects.toThrow('fail');
    expect(await fs.readFile(file, 'utf-8')).toBe('A="1"\n');
  });

  it('merges proxy variables from the process environment under the file values', async () => {
    await fs.writeFile(file, 'HADOOP_HOME="/usr/lib/hadoop"\nhttps_proxy="http://file-proxy:3128"\n');
    const saved = { http: process.env.http_proxy, https: process.env.https_proxy };
    process.env.http_proxy = 'http://proc-proxy:3128';
    process.env.https_proxy = 'http://proc-proxy:3128';
    try {
      const env = await readEtcEnv(file);
      expect(env.HADOOP_HOME).toBe('/usr/lib/hadoop');
      expect(env.http_proxy).toBe('http://proc-proxy:3128');
      expect(env.https_proxy).toBe('http://file-proxy:3128');
    } finally {
      if (saved.http === undefined) delete process.env.http_proxy; else process.env.http_proxy = saved.http;
      if (saved.https === undefined) delete process.env.https_proxy; else process.env.https_proxy = saved.https;
    }
  });
});
