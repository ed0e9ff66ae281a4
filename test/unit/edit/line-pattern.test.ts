import path from 'path';
import fs from 'fs/promises';
import { reEditInPlace } from '../../../src/edit/line-pattern.js';
import { makeTempDir } from '../../helpers/cluster.js';

describe('reEditInPlace', () => {
  let tmpDir: string;
  let file: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    file = path.join(tmpDir, 'hadoop-env.sh');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('substitutes matching lines and leaves others alone', async () => {
    await fs.writeFile(file, '# The java implementation to use.\nexport JAVA_HOME=${JAVA_HOME}\nexport HADOOP_OPTS=""\n');
    await reEditInPlace(file, { 'export JAVA_HOME *=.*': 'export JAVA_HOME=/usr/lib/jvm/java-8' });
    expect(await fs.readFile(file, 'utf-8')).toBe(
      '# The java implementation to use.\nexport JAVA_HOME=/usr/lib/jvm/java-8\nexport HADOOP_OPTS=""\n',
    );
  });

  it('does not append unmatched replacements by default', async () => {
    await fs.writeFile(file, 'a=1\n');
    await reEditInPlace(file, { '^b=.*': 'b=2' });
    expect(await fs.readFile(file, 'utf-8')).toBe('a=1\n');
  });

  it('appends unmatched replacements when asked, adding a missing newline first', async () => {
    await fs.writeFile(file, 'a=1');
    await reEditInPlace(file, { '^a=.*': 'a=9', '^b=.*': 'b=2' }, { appendNonMatches: true });
    expect(await fs.readFile(file, 'utf-8')).toBe('a=9\nb=2\n');
  });

  it('supports back-references', async () => {
    await fs.writeFile(file, 'key = value\n');
    await reEditInPlace(file, { '^(\\w+) = (\\w+)$': '$2=$1' });
    expect(await fs.readFile(file, 'utf-8')).toBe('value=key\n');
  });
});
