import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_CONFIG, deepMerge, loadConfig } from '../../../src/config/loader.js';
import { SetupError, SetupErrorCode } from '../../../src/shared/errors.js';

function codeOf(fn: () => unknown): SetupErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof SetupError) return err.code;
    throw err;
  }
  return undefined;
}

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'fas-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the default file on first run', () => {
    const configPath = path.join(dir, 'nested', 'config.yaml');
    const result = loadConfig(configPath);

    expect(result.firstRun).toBe(true);
    expect(result.configPath).toBe(configPath);
    expect(result.config).toEqual(DEFAULT_CONFIG);
    expect(result.config).not.toBe(DEFAULT_CONFIG);
  });

  it('generates a default file that loads back to the defaults', () => {
    const configPath = path.join(dir, 'config.yaml');
    loadConfig(configPath);
    const second = loadConfig(configPath);

    expect(second.firstRun).toBe(false);
    expect(second.config).toEqual(DEFAULT_CONFIG);
    expect(parseYaml(readFileSync(configPath, 'utf-8'))).toEqual(DEFAULT_CONFIG);
  });

  it('overrides only the keys the file sets', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, [
      'install:',
      '  failure_mode: collect',
      'waydroid:',
      '  aur_helper: paru',
      'distro:',
      '  name: Arch Linux',
    ].join('\n'));

    const { config } = loadConfig(configPath);

    expect(config.install).toEqual({ ...DEFAULT_CONFIG.install, failure_mode: 'collect' });
    expect(config.waydroid).toEqual({ mode: 'prompt', aur_helper: 'paru' });
    expect(config.distro).toEqual({ name: 'Arch Linux' });
    expect(config.sdk).toEqual(DEFAULT_CONFIG.sdk);
  });

  it('treats an empty file as all defaults', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, '');
    expect(loadConfig(configPath).config).toEqual(DEFAULT_CONFIG);
  });

  it('rejects unparseable YAML', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, 'paths: [unclosed\n');
    expect(codeOf(() => loadConfig(configPath))).toBe(SetupErrorCode.CONFIG_INVALID);
  });

  it('rejects a non-mapping root', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, '- a\n- b\n');
    expect(codeOf(() => loadConfig(configPath))).toBe(SetupErrorCode.CONFIG_INVALID);
  });

  it('reports schema violations with their paths', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, 'waydroid:\n  mode: sometimes\n');

    let caught: unknown;
    try {
      loadConfig(configPath);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SetupError);
    const issues = caught instanceof SetupError ? caught.context?.issues : undefined;
    expect(Array.isArray(issues) && issues.length).toBe(1);
    expect(Array.isArray(issues) && String(issues[0]).startsWith('waydroid.mode: ')).toBe(true);
  });

  it('refuses an AUR helper that is not a bare executable name', async () => {
    const configPath = path.join(dir, 'config.yaml');
    await fs.writeFile(configPath, 'waydroid:\n  aur_helper: "yay; rm -rf ~"\n');
    expect(codeOf(() => loadConfig(configPath))).toBe(SetupErrorCode.CONFIG_INVALID);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(deepMerge(
      { a: { x: 1, y: 2 }, list: [1, 2], keep: true },
      { a: { y: 3 }, list: [9] },
    )).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: true });
  });

  it('lets null override a default but ignores undefined', () => {
    expect(deepMerge({ a: 'x', b: 'y' }, { a: null, b: undefined })).toEqual({ a: null, b: 'y' });
  });
});
