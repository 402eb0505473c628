import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigStore, describeConfig, loadCredentials, resolveConfigDir } from './config';
import { DEFAULT_CONFIG, defaultHotkey } from './types';

describe('ConfigStore', () => {
  let dir: string;
  let store: ConfigStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'holdtalk-config-'));
    store = new ConfigStore({ cwd: dir });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts from the defaults', () => {
    expect(store.getAll()).toEqual(DEFAULT_CONFIG);
    expect(store.get('language')).toBe('en-US');
    expect(store.path).toBe(join(dir, 'config.json'));
  });

  it('persists settings across instances', () => {
    store.set('language', 'fr');
    store.set('postProcessPrompt', 'translate to French');

    const reopened = new ConfigStore({ cwd: dir });

    expect(reopened.get('language')).toBe('fr');
    expect(reopened.getAll().postProcessPrompt).toBe('translate to French');
  });

  it('rejects values outside the schema', () => {
    expect(() => store.set('silenceThresholdDb', 5)).toThrow();
    expect(store.get('silenceThresholdDb')).toBe(-50);
  });

  it('notifies changes of one key until unsubscribed', () => {
    const bindings: string[] = [];
    const unsubscribe = store.onChange('hotkey', (binding) => bindings.push(binding));

    store.set('hotkey', 'LEFT CTRL+SPACE');
    store.set('language', 'de');
    unsubscribe();
    store.set('hotkey', 'F9');

    expect(bindings).toEqual(['LEFT CTRL+SPACE']);
  });

  it('resets to the defaults', () => {
    store.set('insertionMode', 'type');

    store.reset();

    expect(store.get('insertionMode')).toBe('paste');
  });
});

describe('defaultHotkey', () => {
  it('uses the right option key on macOS and right control elsewhere', () => {
    expect(defaultHotkey('darwin')).toBe('RIGHT ALT');
    expect(defaultHotkey('linux')).toBe('RIGHT CTRL');
    expect(defaultHotkey('win32')).toBe('RIGHT CTRL');
  });
});

describe('environment', () => {
  it('reads trimmed credentials and treats blanks as missing', () => {
    expect(loadCredentials({ DEEPGRAM_API_KEY: ' test-secret ', OPENAI_API_KEY: '  ' })).toEqual({
      deepgramApiKey: 'test-secret',
      openaiApiKey: undefined,
    });
  });

  it('resolves the config dir override', () => {
    expect(resolveConfigDir({ HOLDTALK_CONFIG_DIR: '/tmp/holdtalk' })).toBe('/tmp/holdtalk');
    expect(resolveConfigDir({ HOLDTALK_CONFIG_DIR: ' ' })).toBeUndefined();
    expect(resolveConfigDir({})).toBeUndefined();
  });

  it('masks keys when describing the config', () => {
    const described = describeConfig(DEFAULT_CONFIG, { deepgramApiKey: 'test-secret' });

    expect(described.deepgramApiKey).toBe('***cret');
    expect(described.openaiApiKey).toBe('(empty)');
    expect(described.language).toBe('en-US');
  });
});
