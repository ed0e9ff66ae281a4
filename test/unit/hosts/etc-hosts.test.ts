import path from 'path';
import fs from 'fs/promises';
import {
  getKvHosts, manageEtcHosts, removeKvHosts, resolvePrivateAddress, updateEtcHosts, updateKvHost, updateKvHosts,
} from '../../../src/hosts/etc-hosts.js';
import { FlagStore } from '../../../src/state/flag-store.js';
import { ConfigError } from '../../../src/errors.js';
import { makeTempDir } from '../../helpers/cluster.js';

describe('hosts file management', () => {
  let tmpDir: string;
  let hostsFile: string;
  let store: FlagStore;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    hostsFile = path.join(tmpDir, 'hosts');
    store = await FlagStore.open(path.join(tmpDir, 'state.json'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true });
  });

  it('keeps unmanaged lines and replaces managed ones', async () => {
    await fs.writeFile(hostsFile, [
      '127.0.0.1 localhost',
      '10.0.0.9 stale  # HADOOP-HA MANAGED',
      '::1 ip6-localhost',
      '',
    ].join('\n'));
    await updateEtcHosts(hostsFile, { '10.0.0.1': 'nn1', '10.0.0.2': 'nn2' });
    expect(await fs.readFile(hostsFile, 'utf-8')).toBe([
      '127.0.0.1 localhost',
      '::1 ip6-localhost',
      '10.0.0.1 nn1  # HADOOP-HA MANAGED',
      '10.0.0.2 nn2  # HADOOP-HA MANAGED',
      '',
    ].join('\n'));
  });

  it('comments out entries whose address is not IPv4', async () => {
    await updateEtcHosts(hostsFile, { 'fe80::1': 'nn1' });
    expect(await fs.readFile(hostsFile, 'utf-8')).toBe('# fe80::1 nn1  # HADOOP-HA MANAGED (INVALID IP)\n');
  });

  it('writes one line per hostname', async () => {
    await updateEtcHosts(hostsFile, { '10.0.0.1': 'nn1', '10.0.0.5': 'nn1' });
    expect(await fs.readFile(hostsFile, 'utf-8')).toBe('10.0.0.5 nn1  # HADOOP-HA MANAGED\n');
  });

  it('tracks hosts in the store and regenerates the file from them', async () => {
    await updateKvHosts(store, { '10.0.0.1': 'nn1', '10.0.0.2': 'nn2' });
    await updateKvHost(store, '10.0.0.3', 'nn1');
    expect(getKvHosts(store)).toEqual({ '10.0.0.2': 'nn2', '10.0.0.3': 'nn1' });
    await removeKvHosts(store, ['nn2']);
    await manageEtcHosts(store, hostsFile);
    expect(await fs.readFile(hostsFile, 'utf-8')).toBe('10.0.0.3 nn1  # HADOOP-HA MANAGED\n');
  });

  describe('resolvePrivateAddress', () => {
    it('passes IPv4 addresses through', async () => {
      const lookup = jest.fn();
      expect(await resolvePrivateAddress('10.1.2.3', lookup)).toBe('10.1.2.3');
      expect(lookup).not.toHaveBeenCalled();
    });

    it('resolves hostnames', async () => {
      expect(await resolvePrivateAddress('nn1.internal', async () => '10.4.5.6')).toBe('10.4.5.6');
    });

    it('guesses an address embedded in the name when lookup fails', async () => {
      const fail = async (): Promise<string> => {
        throw new Error('ENOTFOUND');
      };
      expect(await resolvePrivateAddress('ip-10-0-0-5.ec2.internal', fail)).toBe('10.0.0.5');
      await expect(resolvePrivateAddress('nowhere', fail)).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
