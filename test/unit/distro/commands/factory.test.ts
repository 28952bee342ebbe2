import { createDistroCommands } from '../../../../src/distro/commands/factory.js';
import { ArchCommands } from '../../../../src/distro/commands/arch.js';
import { DebianCommands } from '../../../../src/distro/commands/debian.js';
import { FedoraCommands } from '../../../../src/distro/commands/fedora.js';
import { OpenSuseCommands } from '../../../../src/distro/commands/opensuse.js';
import { SetupErrorCode } from '../../../../src/shared/errors.js';

describe('createDistroCommands', () => {
  it.each([
    { name: 'Arch Linux', cls: ArchCommands },
    { name: 'EndeavourOS', cls: ArchCommands },
    { name: 'Ubuntu', cls: DebianCommands },
    { name: 'Linux Mint', cls: DebianCommands },
    { name: 'Fedora Linux', cls: FedoraCommands },
    { name: 'openSUSE Tumbleweed', cls: OpenSuseCommands },
  ])('dispatches $name', ({ name, cls }) => {
    const result = createDistroCommands({ name });
    expect(result.ok && result.value).toBeInstanceOf(cls);
  });

  it('fails with UNSUPPORTED_PLATFORM for unknown names', () => {
    const result = createDistroCommands({ name: 'Slackware' });
    expect(!result.ok && result.error.code).toBe(SetupErrorCode.UNSUPPORTED_PLATFORM);
  });
});

describe('ArchCommands', () => {
  const cmds = new ArchCommands();

  it('queries with pacman -Q and installs with --noconfirm', () => {
    expect(cmds.queryInstalled('git').argv).toEqual(['pacman', '-Q', 'git']);
    expect(cmds.install(['curl']).argv).toEqual(['sudo', 'pacman', '-S', '--noconfirm', '--needed', 'curl']);
    expect(cmds.refreshIndex().argv).toEqual(['sudo', 'pacman', '-Syu', '--noconfirm']);
  });

  it('installs Waydroid through the AUR helper', () => {
    const plan = cmds.waydroidInstall('paru');
    expect(plan.requires).toBe('paru');
    expect(plan.commands.map((c) => c.argv)).toEqual([['paru', '-S', '--noconfirm', '--needed', 'waydroid']]);
  });

  it('grants device access through adbusers', () => {
    expect(cmds.deviceAccess('dev').map((c) => c.argv)).toEqual([
      ['sudo', 'usermod', '-aG', 'adbusers', 'dev'],
      ['sudo', 'udevadm', 'control', '--reload-rules'],
      ['sudo', 'udevadm', 'trigger'],
    ]);
  });
});

describe('DebianCommands', () => {
  const cmds = new DebianCommands();

  it('checks dpkg status and installs non-interactively', () => {
    expect(cmds.queryInstalled('git').argv).toEqual([
      'bash',
      '-c',
      "dpkg-query -W -f='${Status}' git 2>/dev/null | grep -q 'install ok installed'",
    ]);
    const install = cmds.install(['curl']);
    expect(install.argv).toEqual(['sudo', '-E', 'apt-get', 'install', '-y', 'curl']);
    expect(install.env).toEqual({ DEBIAN_FRONTEND: 'noninteractive' });
  });

  it('adds the vendor repository before installing Waydroid', () => {
    const plan = cmds.waydroidInstall();
    expect(plan.requires).toBe('curl');
    expect(plan.commands.map((c) => c.argv[0])).toEqual(['bash', 'sudo']);
    expect(plan.commands[0].argv[2].startsWith('set -o pipefail; curl ')).toBe(true);
  });
});

describe('rpm families', () => {
  it('query with rpm -q and install with their own manager', () => {
    expect(new FedoraCommands().queryInstalled('git').argv).toEqual(['rpm', '-q', 'git']);
    expect(new FedoraCommands().install(['git']).argv).toEqual(['sudo', 'dnf', 'install', '-y', 'git']);
    expect(new OpenSuseCommands().install(['git']).argv).toEqual(['sudo', 'zypper', '--non-interactive', 'install', 'git']);
    expect(new OpenSuseCommands().waydroidInstall().requires).toBeNull();
  });
});
