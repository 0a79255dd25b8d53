import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, createStore, loadSettings, resetSettings, saveSettings } from './store';

describe('settings store', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('starts with defaults', async () => {
    const store = await createStore({ cwd: tmpDir });

    expect(loadSettings(store)).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toMatchObject({ extension: '.pdf', mode: 'prefix', delimiter: '-', backup: true });
  });

  it('persists saved values, including an empty delimiter', async () => {
    const store = await createStore({ cwd: tmpDir });
    saveSettings(store, { mode: 'replace', delimiter: '', targetFolder: '/data/docs' });

    const reopened = await createStore({ cwd: tmpDir });
    expect(loadSettings(reopened)).toEqual({
      ...DEFAULT_SETTINGS,
      mode: 'replace',
      delimiter: '',
      targetFolder: '/data/docs',
    });
  });

  it('falls back to defaults for a corrupt file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'config.json'), '{not json');

    const store = await createStore({ cwd: tmpDir });

    expect(loadSettings(store)).toEqual(DEFAULT_SETTINGS);
  });

  it('replaces only the invalid fields', async () => {
    fs.writeFileSync(path.join(tmpDir, 'config.json'), JSON.stringify({ mode: 'sideways', delimiter: '_' }));

    const store = await createStore({ cwd: tmpDir });

    expect(loadSettings(store)).toEqual({ ...DEFAULT_SETTINGS, delimiter: '_' });
  });

  it('resets to defaults', async () => {
    const store = await createStore({ cwd: tmpDir });
    saveSettings(store, { recursive: true });

    resetSettings(store);

    expect(loadSettings(store)).toEqual(DEFAULT_SETTINGS);
  });
});
