import { parseOsRelease, resolveFamily } from '../../../src/distro/detector.js';
import { createDistroCommands } from '../../../src/distro/commands/factory.js';

describe('distro detection', () => {
  it('parses os-release fields and strips quotes', () => {
    expect(parseOsRelease('NAME="Ubuntu"\nVERSION_ID="22.04"\nID=ubuntu\n# comment\n')).toEqual({
      NAME: 'Ubuntu',
      VERSION_ID: '22.04',
      ID: 'ubuntu',
    });
  });

  it('maps ids to families', () => {
    expect(resolveFamily({ ID: 'ubuntu' })).toBe('debian');
    expect(resolveFamily({ ID: 'rocky', ID_LIKE: 'rhel centos fedora' })).toBe('rhel');
    expect(resolveFamily({ ID: 'pop', ID_LIKE: 'ubuntu debian' })).toBe('debian');
    expect(resolveFamily({})).toBe('debian');
  });

  it('builds distro-specific provisioning commands', () => {
    const rhel = createDistroCommands({
      family: 'rhel', name: 'Rocky Linux', version: '9', package_manager: 'dnf', firewall_backend: 'firewalld',
    });
    const debian = createDistroCommands({
      family: 'debian', name: 'Ubuntu', version: '22.04', package_manager: 'apt', firewall_backend: 'ufw',
    });
    expect(debian.directoryCreate({ path: '/data', owner: 'hdfs', group: 'hadoop', perms: 0o750 }).argv).toEqual([
      'sudo', 'install', '-d', '-o', 'hdfs', '-g', 'hadoop', '-m', '0750', '/data',
    ]);
    expect(rhel.packageInstall(['java-1.8.0-openjdk']).argv).toEqual(['sudo', 'dnf', 'install', '-y', 'java-1.8.0-openjdk']);
  });
});
