import { installWaydroid } from '../../../src/install/waydroid.js';
import { SetupErrorCode } from '../../../src/shared/errors.js';
import type { DistributionInfo } from '../../../src/types/distro.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';
import { ARCH, UBUNTU, makeContext } from '../../helpers/context.js';

const FEDORA: DistributionInfo = { name: 'Fedora Linux', prettyName: 'Fedora Linux 40', version: '40', family: 'fedora', source: 'os-release' };

describe('installWaydroid', () => {
  it('skips when waydroid is already on PATH', async () => {
    const executor = new FakeExecutor();
    const result = await installWaydroid(ARCH, makeContext(executor));

    expect(result).toEqual({ ok: true, value: { installed: [], skipped: ['waydroid'], failed: [] } });
    expect(executor.lines()).toEqual(['bash -c command -v waydroid']);
  });

  it('installs through the AUR helper on Arch', async () => {
    const executor = new FakeExecutor().on('bash -c command -v waydroid', { exitCode: 1 });
    const result = await installWaydroid(ARCH, makeContext(executor));

    expect(result).toEqual({ ok: true, value: { installed: ['waydroid'], skipped: [], failed: [] } });
    expect(executor.lines()).toEqual([
      'bash -c command -v waydroid',
      'bash -c command -v yay',
      'yay -S --noconfirm --needed waydroid',
    ]);
  });

  it('fails with INSTALL_FAILED when the AUR helper is missing', async () => {
    const executor = new FakeExecutor()
      .on('bash -c command -v waydroid', { exitCode: 1 })
      .on('bash -c command -v yay', { exitCode: 1 });
    const result = await installWaydroid(ARCH, makeContext(executor));

    expect(!result.ok && result.error.code).toBe(SetupErrorCode.INSTALL_FAILED);
    expect(!result.ok && result.error.message).toBe("Waydroid on Arch Linux needs 'yay', which is not installed");
    expect(executor.calls).toHaveLength(2);
  });

  it('adds the vendor repository before installing on Debian-family hosts', async () => {
    const executor = new FakeExecutor().on('bash -c command -v waydroid', { exitCode: 1 });
    const result = await installWaydroid(UBUNTU, makeContext(executor));

    expect(result.ok).toBe(true);
    expect(executor.lines()).toEqual([
      'bash -c command -v waydroid',
      'bash -c command -v curl',
      'bash -c set -o pipefail; curl -fsSL https://repo.waydro.id | sudo bash',
      'sudo -E apt-get install -y waydroid',
    ]);
  });

  it('uses the native package manager on Fedora without a helper check', async () => {
    const executor = new FakeExecutor().on('bash -c command -v waydroid', { exitCode: 1 });
    await installWaydroid(FEDORA, makeContext(executor));
    expect(executor.lines()).toEqual(['bash -c command -v waydroid', 'sudo dnf install -y waydroid']);
  });

  it('stops at the first failing step', async () => {
    const executor = new FakeExecutor()
      .on('bash -c command -v waydroid', { exitCode: 1 })
      .on('bash -c set -o pipefail', { exitCode: 6, stderr: 'could not resolve host\n' });
    const result = await installWaydroid(UBUNTU, makeContext(executor));

    expect(!result.ok && result.error.message).toBe('Waydroid install failed (exit 6)');
    expect(!result.ok && result.error.context).toEqual({
      command: "bash -c 'set -o pipefail; curl -fsSL https://repo.waydro.id | sudo bash'",
      stderr: 'could not resolve host',
    });
    expect(executor.calls).toHaveLength(3);
  });

  it('rejects unsupported distributions before spawning anything', async () => {
    const executor = new FakeExecutor();
    const result = await installWaydroid({ ...ARCH, name: 'Gentoo' }, makeContext(executor));
    expect(!result.ok && result.error.code).toBe(SetupErrorCode.UNSUPPORTED_PLATFORM);
    expect(executor.calls).toHaveLength(0);
  });
});
