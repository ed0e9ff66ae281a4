import fs from 'fs/promises';
import { HA_FLAGS, HaCoordinator } from '../../../src/hadoop/ha-coordinator.js';
import { HaStateError } from '../../../src/errors.js';
import { makeCluster, makeTempDir, TestCluster } from '../../helpers/cluster.js';

describe('HaCoordinator', () => {
  let tmpDir: string;
  let c: TestCluster;
  let hdfsBin: string;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    c = await makeCluster(tmpDir);
    hdfsBin = `su hdfs -c ${tmpDir}/usr/lib/hadoop/bin/hdfs`;
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  describe('format', () => {
    it('stops the NameNode and formats it exactly once', async () => {
      expect(await c.ha.format()).toBe(true);
      expect(await c.ha.format()).toBe(false);
      expect(c.executor.matching('namenode -format')).toEqual([`${hdfsBin} namenode -format -noninteractive`]);
      expect(c.executor.matching('hadoop-daemon.sh')).toEqual([
        `su hdfs -c ${tmpDir}/usr/lib/hadoop/sbin/hadoop-daemon.sh --config ${tmpDir}/etc/hadoop/conf stop namenode`,
      ]);
      expect(c.store.flag(HA_FLAGS.formatted)).toBe(true);
      expect(c.ha.state()).toBe('formatted');
    });

    it('survives a restart without reformatting', async () => {
      await c.ha.format();
      const reopened = await makeCluster(tmpDir);
      expect(await reopened.ha.format()).toBe(false);
      expect(reopened.executor.lines).toEqual([]);
    });

    it('leaves the flag unset when formatting fails', async () => {
      c.executor.on('namenode -format', { exitCode: 1, stderr: 'disk full' });
      await expect(c.ha.format()).rejects.toThrow('Command exited with 1');
      expect(c.store.flag(HA_FLAGS.formatted)).toBe(false);
      expect(c.ha.state()).toBe('uninitialized');
    });

    it('refuses to format a bootstrapped standby', async () => {
      await c.store.set(HA_FLAGS.state, 'standby-bootstrapped');
      await expect(c.ha.format()).rejects.toThrow('Refusing to format a NameNode in state standby-bootstrapped');
      expect(c.executor.lines).toEqual([]);
    });
  });

  describe('bootstrap', () => {
    it('formats and initializes shared edits on the first node', async () => {
      const result = await c.ha.bootstrap(['nn1', 'nn2']);
      expect(result).toEqual({ role: 'first', actions: ['format', 'initializeSharedEdits'] });
      expect(c.executor.matching(hdfsBin)).toEqual([
        `${hdfsBin} namenode -format -noninteractive`,
        `${hdfsBin} namenode -initializeSharedEdits -nonInteractive -force`,
      ]);
      expect(c.ha.state()).toBe('shared-edits-ready');
    });

    it('does nothing the second time on the first node', async () => {
      await c.ha.bootstrap(['nn1', 'nn2']);
      const issued = c.executor.lines.length;
      expect(await c.ha.bootstrap(['nn1', 'nn2'])).toEqual({ role: 'first', actions: [] });
      expect(c.executor.lines).toHaveLength(issued);
    });

    it('bootstraps a standby on later nodes, once', async () => {
      expect(await c.ha.bootstrap(['nn0', 'nn1'])).toEqual({ role: 'standby', actions: ['bootstrapStandby'] });
      expect(await c.ha.bootstrap(['nn0', 'nn1'])).toEqual({ role: 'standby', actions: [] });
      expect(c.executor.matching('-bootstrapStandby')).toEqual([
        `${hdfsBin} namenode -bootstrapStandby -nonInteractive -force`,
      ]);
      expect(c.executor.matching('-format')).toEqual([]);
      expect(c.ha.state()).toBe('standby-bootstrapped');
    });

    it('rejects a node missing from the order', async () => {
      await expect(c.ha.bootstrap(['nn2', 'nn3'])).rejects.toThrow('Node nn1 is not in the bootstrap order');
    });

    it('guards the individual steps', async () => {
      await expect(c.ha.initializeSharedEdits()).rejects.toThrow(HaStateError);
      await c.ha.format();
      await expect(c.ha.bootstrapStandby()).rejects.toThrow('The formatted NameNode cannot be bootstrapped as a standby');
    });
  });

  describe('ensureHAActive', () => {
    function states(nn1: string, nn2: string): void {
      c.executor.on('-getServiceState nn1', { stdout: `${nn1}\n` });
      c.executor.on('-getServiceState nn2', { stdout: `${nn2}\n` });
    }

    it('promotes the preferred leader when both are standby', async () => {
      states('standby', 'standby');
      const result = await c.ha.ensureHAActive(['nn1', 'nn2'], 'nn2');
      expect(result).toEqual({ states: { nn1: 'standby', nn2: 'standby' }, promoted: 'nn2' });
      expect(c.executor.matching('-transitionToActive')).toEqual([`${hdfsBin} haadmin -transitionToActive nn2`]);
      expect(c.ha.state()).toBe('standby');
    });

    it('records the local node as active when it is promoted', async () => {
      states('standby', 'standby');
      await c.ha.ensureHAActive(['nn1', 'nn2'], 'nn1');
      expect(c.ha.state()).toBe('active');
    });

    it('does nothing when one node is already active', async () => {
      states('standby', 'active');
      const result = await c.ha.ensureHAActive(['nn1', 'nn2'], 'nn1');
      expect(result).toEqual({ states: { nn1: 'standby', nn2: 'active' }, promoted: null });
      expect(c.executor.matching('-transitionToActive')).toEqual([]);
    });

    it('treats an unreachable peer as not active', async () => {
      c.executor.on('-getServiceState nn1', { stdout: 'standby\n' });
      c.executor.on('-getServiceState nn2', { exitCode: 255, stderr: 'Connection refused\n' });
      const result = await c.ha.ensureHAActive(['nn1', 'nn2'], 'nn1');
      expect(result).toEqual({ states: { nn1: 'standby', nn2: 'Connection refused' }, promoted: 'nn1' });
    });

    it('passes the connect retry override to haadmin', async () => {
      const ha = new HaCoordinator(c.hdfs, c.store, 'nn1', 2);
      c.executor.on('-getServiceState', { stdout: 'active' });
      await ha.ensureHAActive(['nn1', 'nn2'], 'nn1');
      expect(c.executor.matching('-getServiceState nn2')).toEqual([
        `${hdfsBin} haadmin -Dipc.client.connect.max.retries.on.timeouts=2 -getServiceState nn2`,
      ]);
    });

    it('requires exactly two distinct candidates', async () => {
      await expect(c.ha.ensureHAActive(['nn1'], 'nn1')).rejects.toThrow(
        'Automatic failover needs exactly two distinct NameNodes, got 1',
      );
      await expect(c.ha.ensureHAActive(['nn1', 'nn2', 'nn3'], 'nn1')).rejects.toThrow(HaStateError);
      await expect(c.ha.ensureHAActive(['nn1', 'nn1'], 'nn1')).rejects.toThrow(HaStateError);
      expect(c.executor.lines).toEqual([]);
    });

    it('requires the preferred leader to be a candidate', async () => {
      await expect(c.ha.ensureHAActive(['nn1', 'nn2'], 'nn3')).rejects.toThrow('Preferred leader nn3 is not a candidate');
    });
  });

  it('never moves the HA state backwards', async () => {
    await c.store.set(HA_FLAGS.state, 'active');
    await c.store.set(HA_FLAGS.formatted, true);
    await expect(c.ha.initializeSharedEdits()).rejects.toThrow('Cannot move HA state from active back to shared-edits-ready');
    expect(c.ha.state()).toBe('active');
  });

  it('reads an unknown persisted state as uninitialized', async () => {
    await c.store.set(HA_FLAGS.state, 'bogus');
    expect(c.ha.state()).toBe('uninitialized');
  });

  it('creates the cluster directories once', async () => {
    expect(await c.ha.createClusterDirectories()).toBe(true);
    expect(await c.ha.createClusterDirectories()).toBe(false);
    const dfs = c.executor.matching(`${hdfsBin} dfs`);
    expect(dfs).toHaveLength(14);
    expect(dfs[0]).toBe(`${hdfsBin} dfs -mkdir -p /tmp/hadoop/mapred/staging`);
    expect(dfs[13]).toBe(`${hdfsBin} dfs -chown yarn /app-logs`);
  });
});
