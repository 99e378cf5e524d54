import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { cliToRaw, loadConfigFile, resolveConfig } from '../resolve';
import { defaultChromeUserDataDir } from '../defaults';
import { DEFAULT_MAX_STEPS, DEFAULT_WAIT_SECS } from '../schema';
import { ConfigError } from '../../errors';

describe('cliToRaw', () => {
  it('should coerce numeric flags', () => {
    expect(cliToRaw({ maxSteps: '50', waitSecs: '2.5', headless: true })).toEqual({
      max_steps: 50,
      wait_secs: 2.5,
      headless: true,
    });
  });

  it('should reject a non-numeric step budget', () => {
    expect(() => cliToRaw({ maxSteps: 'lots' })).toThrow(ConfigError);
  });

  it('should reject a zero step budget', () => {
    expect(() => cliToRaw({ maxSteps: '0' })).toThrow(/max_steps/);
  });
});

describe('resolveConfig', () => {
  it('should fill defaults', () => {
    const config = resolveConfig({ chrome_user_data_dir: '/profiles' }, {}, {});

    expect(config).toEqual({
      chromeUserDataDir: '/profiles',
      chromeProfileName: 'Default',
      headless: false,
      storyPath: null,
      maxSteps: DEFAULT_MAX_STEPS,
      waitSecs: DEFAULT_WAIT_SECS,
      username: null,
      password: null,
    });
  });

  it('should let config file values win over flags', () => {
    const config = resolveConfig(
      { max_steps: 10, story_path: '/from-cli', headless: true },
      { max_steps: 30, headless: false },
      {}
    );

    expect(config.maxSteps).toBe(30);
    expect(config.headless).toBe(false);
    expect(config.storyPath).toBe('/from-cli');
  });

  it('should take missing credentials and the browser binary from the environment', () => {
    const config = resolveConfig({ username: 'flag-user' }, {}, {
      STORY_AUTOPILOT_USERNAME: 'env-user',
      STORY_AUTOPILOT_PASSWORD: 'test-secret',
      CHROME_PATH: '/usr/bin/chromium',
    });

    expect(config.username).toBe('flag-user');
    expect(config.password).toBe('test-secret');
    expect(config.executablePath).toBe('/usr/bin/chromium');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'story-autopilot-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read snake_case keys', async () => {
    const file = path.join(dir, 'good.json');
    await writeFile(file, JSON.stringify({ max_steps: 25, story_path: '/en/es-1', extra: true }));

    await expect(loadConfigFile(file)).resolves.toEqual({ max_steps: 25, story_path: '/en/es-1' });
  });

  it('should reject invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ max_steps: ');

    await expect(loadConfigFile(file)).rejects.toThrow(/is not valid JSON/);
  });

  it('should reject values of the wrong type', async () => {
    const file = path.join(dir, 'typed.json');
    await writeFile(file, JSON.stringify({ headless: 'yes' }));

    await expect(loadConfigFile(file)).rejects.toThrow(ConfigError);
  });

  it('should reject a missing file', async () => {
    await expect(loadConfigFile(path.join(dir, 'absent.json'))).rejects.toThrow(/Cannot read config file/);
  });
});

describe('defaultChromeUserDataDir', () => {
  it('should use ~/.config on Linux', () => {
    expect(defaultChromeUserDataDir('linux', {}, '/home/learner')).toBe('/home/learner/.config/google-chrome');
  });

  it('should use Application Support on macOS', () => {
    expect(defaultChromeUserDataDir('darwin', {}, '/Users/learner'))
      .toBe('/Users/learner/Library/Application Support/Google/Chrome');
  });

  it('should use LOCALAPPDATA on Windows', () => {
    expect(defaultChromeUserDataDir('win32', { LOCALAPPDATA: 'C:\\Users\\learner\\AppData\\Local' }, 'C:\\Users\\learner'))
      .toBe('C:\\Users\\learner\\AppData\\Local\\Google\\Chrome\\User Data');
  });
});
