import { detect, detectToolHomes, parseKeyValueFile, createProbeHost, type ProbeHost } from '../../../src/distro/detector.js';
import { DISPATCH_TABLE } from '../../../src/distro/dispatch.js';
import { SetupErrorCode } from '../../../src/shared/errors.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';

function fakeHost(files: Record<string, string>, commands: Record<string, string> = {}): ProbeHost & { ran: string[] } {
  const ran: string[] = [];
  return {
    ran,
    async readFile(path) {
      return files[path] ?? null;
    },
    async run(argv) {
      const line = argv.join(' ');
      ran.push(line);
      return commands[line] ?? null;
    },
  };
}

describe('parseKeyValueFile', () => {
  it('parses quoted and unquoted values and ignores comments', () => {
    const fields = parseKeyValueFile('# comment\nNAME="Arch Linux"\nID=arch\nBUILD_ID=rolling\nPRETTY_NAME=\'Arch\'\n');
    expect(fields).toEqual({ NAME: 'Arch Linux', ID: 'arch', BUILD_ID: 'rolling', PRETTY_NAME: 'Arch' });
  });
});

describe('detect', () => {
  it('round-trips every dispatch key through /etc/os-release', async () => {
    for (const key of Object.keys(DISPATCH_TABLE)) {
      const result = await detect(fakeHost({ '/etc/os-release': `NAME="${key}"\nVERSION_ID="1"\n` }));
      expect(result.ok && result.value.name).toBe(key);
    }
  });

  it('returns family, version and source from os-release', async () => {
    const result = await detect(fakeHost({ '/etc/os-release': 'NAME="Ubuntu"\nID=ubuntu\nVERSION_ID="24.04"\n' }));
    expect(result).toEqual({
      ok: true,
      value: { name: 'Ubuntu', prettyName: 'Ubuntu', version: '24.04', family: 'debian', source: 'os-release' },
    });
  });

  it('resolves derivatives through ID_LIKE', async () => {
    const result = await detect(fakeHost({ '/etc/os-release': 'NAME="CachyOS Linux"\nID=cachyos\nID_LIKE=arch\n' }));
    expect(result.ok && result.value).toMatchObject({ name: 'Arch Linux', prettyName: 'CachyOS Linux', family: 'arch' });
  });

  it('stops at os-release without running any command probe', async () => {
    const host = fakeHost({ '/etc/os-release': 'NAME="Fedora Linux"\n' });
    await detect(host);
    expect(host.ran).toEqual([]);
  });

  it('falls back to lsb_release when no os-release file exists', async () => {
    const host = fakeHost({}, { 'lsb_release -si': 'ManjaroLinux', 'lsb_release -sr': '24.0.1' });
    const result = await detect(host);
    expect(result.ok && result.value).toMatchObject({ name: 'Manjaro Linux', version: '24.0.1', source: 'lsb_release' });
  });

  it('falls back to /etc/lsb-release when lsb_release is missing', async () => {
    const host = fakeHost({ '/etc/lsb-release': 'DISTRIB_ID=Ubuntu\nDISTRIB_RELEASE=22.04\n' });
    const result = await detect(host);
    expect(result.ok && result.value).toMatchObject({ name: 'Ubuntu', version: '22.04', source: 'lsb-release-file' });
  });

  it('fails with UNSUPPORTED_PLATFORM when only uname answers', async () => {
    const host = fakeHost({}, { 'uname -s': 'Linux', 'uname -r': '6.9.0' });
    const result = await detect(host);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(SetupErrorCode.UNSUPPORTED_PLATFORM);
      expect(result.error.message).toBe('Unsupported distribution: Linux');
    }
  });

  it('fails with UNSUPPORTED_PLATFORM when no probe yields a name', async () => {
    const result = await detect(fakeHost({}));
    expect(!result.ok && result.error.code).toBe(SetupErrorCode.UNSUPPORTED_PLATFORM);
  });

  it('uses the first probe with a name even if a later one would match', async () => {
    const host = fakeHost({ '/etc/os-release': 'NAME="Gentoo"\nID=gentoo\n' }, { 'lsb_release -si': 'Ubuntu' });
    const result = await detect(host);
    expect(!result.ok && result.error.message).toBe('Unsupported distribution: Gentoo');
  });

  it('honours a configured override without probing', async () => {
    const host = fakeHost({ '/etc/os-release': 'NAME="Ubuntu"\n' });
    const result = await detect(host, { override: { name: 'arch', version: 'rolling' } });
    expect(result.ok && result.value).toMatchObject({ name: 'Arch Linux', version: 'rolling', source: 'config' });
  });
});

describe('createProbeHost', () => {
  it('returns trimmed stdout for successful commands and null otherwise', async () => {
    const executor = new FakeExecutor(1).on('lsb_release -si', { exitCode: 0, stdout: 'Arch\n' });
    const host = createProbeHost(executor);
    expect(await host.run(['lsb_release', '-si'])).toBe('Arch');
    expect(await host.run(['uname', '-s'])).toBeNull();
  });

  it('returns null for unreadable files', async () => {
    const host = createProbeHost(new FakeExecutor());
    expect(await host.readFile('/nonexistent/os-release')).toBeNull();
  });
});

describe('detectToolHomes', () => {
  it('reports exported toolchain variables', () => {
    expect(detectToolHomes({ FLUTTER_HOME: '/opt/flutter', ANDROID_SDK_ROOT: '/sdk', JAVA_HOME: ' /jdk ' })).toEqual({
      flutterHome: '/opt/flutter',
      androidHome: '/sdk',
      javaHome: '/jdk',
    });
  });

  it('prefers ANDROID_HOME over ANDROID_SDK_ROOT and ignores empty values', () => {
    expect(detectToolHomes({ ANDROID_HOME: '/a', ANDROID_SDK_ROOT: '/b', JAVA_HOME: '' })).toEqual({ androidHome: '/a' });
  });
});
