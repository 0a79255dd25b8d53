import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildRunConfig, handleBlankTemplate, handlePreview, handleRun, handleScan, type HandlerContext } from './cli-handlers';
import { DEFAULT_SETTINGS, type StoreSchema } from './services/store';

function createContext(confirmed = true) {
  let settings: StoreSchema = { ...DEFAULT_SETTINGS };
  const messages: string[] = [];
  const confirmRun = vi.fn(async () => confirmed);

  const context: HandlerContext = {
    onProgress: (message) => messages.push(message),
    confirmRun,
    loadSettings: async () => settings,
    saveSettings: async (partial) => {
      settings = { ...settings, ...partial };
    },
    resetSettings: async () => {
      settings = { ...DEFAULT_SETTINGS };
    },
  };

  return { context, messages, confirmRun, settings: () => settings };
}

describe('buildRunConfig', () => {
  const saved: StoreSchema = {
    ...DEFAULT_SETTINGS,
    indexPath: '/data/docs/sheet-index-20260101.xlsx',
    targetFolder: '/data/docs',
  };

  it('uses saved settings when no options are given', () => {
    expect(buildRunConfig({}, saved)).toEqual({
      indexPath: '/data/docs/sheet-index-20260101.xlsx',
      targetFolder: '/data/docs',
      extension: '.pdf',
      mode: 'prefix',
      delimiter: '-',
      recursive: false,
      backup: true,
      dryRun: false,
      collisionPolicy: 'platform',
    });
  });

  it('drops the saved index when the folder changes', () => {
    const config = buildRunConfig({ folder: '/data/other' }, saved);

    expect(config.targetFolder).toBe(path.resolve('/data/other'));
    expect(config.indexPath).toBe('');
  });

  it('keeps an explicit index when the folder changes', () => {
    const config = buildRunConfig({ folder: '/data/other', index: '/data/other/list.xlsx' }, saved);

    expect(config.indexPath).toBe(path.resolve('/data/other/list.xlsx'));
  });

  it('applies option overrides and keeps an empty delimiter', () => {
    const config = buildRunConfig({ ext: 'jpg', mode: 'replace', delimiter: '', dryRun: true, backup: false }, saved);

    expect(config).toMatchObject({ extension: '.jpg', mode: 'replace', delimiter: '', dryRun: true, backup: false });
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('command handlers', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-handlers-'));
    fs.writeFileSync(path.join(tmpDir, 'invoice.pdf'), '');
    fs.writeFileSync(path.join(tmpDir, 'scan.pdf'), '');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('scans a folder and remembers the template', async () => {
    const { context, settings } = createContext();

    const result = await handleScan(tmpDir, { ext: 'pdf' }, context);

    expect(result).toEqual({ success: true, summary: '模板已生成，共 2 个文件' });
    expect(settings().targetFolder).toBe(tmpDir);
    expect(fs.existsSync(settings().indexPath)).toBe(true);
  });

  it('reports scan failures as results', async () => {
    const { context } = createContext();

    const result = await handleScan(path.join(tmpDir, 'missing'), {}, context);

    expect(result.success).toBe(false);
  });

  it('rejects invalid option values', async () => {
    const { context } = createContext();

    const result = await handlePreview({ folder: tmpDir, mode: 'sideways' }, context);

    expect(result.success).toBe(false);
  });

  it('previews the plan', async () => {
    const { context, messages } = createContext();
    await handleScan(tmpDir, { ext: '.pdf' }, context);

    const result = await handlePreview({ folder: tmpDir }, context);

    expect(result).toEqual({ success: true, summary: '预览完成，未修改任何文件' });
    expect(messages).toContain('Summary: 2 file(s) will be renamed');
    expect(fs.readdirSync(tmpDir).filter((name) => name.endsWith('.pdf')).sort()).toEqual(['invoice.pdf', 'scan.pdf']);
  });

  it('does nothing when the run is not confirmed', async () => {
    const { context, confirmRun } = createContext(false);
    await handleScan(tmpDir, { ext: '.pdf' }, context);

    const result = await handleRun({ folder: tmpDir }, context);

    expect(confirmRun).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ success: false, error: '已取消重命名' });
    expect(fs.existsSync(path.join(tmpDir, 'invoice.pdf'))).toBe(true);
  });

  it('renames without asking when --yes is given', async () => {
    const { context, confirmRun } = createContext(false);
    await handleScan(tmpDir, { ext: '.pdf' }, context);

    const result = await handleRun({ folder: tmpDir, yes: true, backup: false }, context);

    expect(confirmRun).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
    expect(fs.readdirSync(tmpDir).filter((name) => name.endsWith('.pdf')).sort()).toEqual([
      '001-invoice.pdf',
      '002-scan.pdf',
    ]);
  });

  it('does not ask for confirmation on a dry run', async () => {
    const { context, confirmRun } = createContext(false);
    await handleScan(tmpDir, { ext: '.pdf' }, context);

    const result = await handleRun({ folder: tmpDir, dryRun: true }, context);

    expect(confirmRun).not.toHaveBeenCalled();
    expect(result.success).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'invoice.pdf'))).toBe(true);
  });

  it('saves a blank template', async () => {
    const { context } = createContext();
    const output = path.join(tmpDir, 'blank.xlsx');

    expect(await handleBlankTemplate(output, context)).toEqual({ success: true, summary: '空白模板已生成' });
    expect(fs.existsSync(output)).toBe(true);
  });
});
