import path from 'path';
import { Command, Option } from 'commander';
import { confirm, isCancel } from '@clack/prompts';
import { z } from 'zod';
import type { ProgressCallback, ToolResult } from '@shared/types/common';
import type { RenameRunConfig } from '@shared/types/file-rename';
import {
  createBlankTemplate,
  previewRenames,
  renameFromIndex,
  resolveRunConfig,
  scanAndCreateTemplate,
} from './services/file-rename';
import { getStore, loadSettings, resetSettings, saveSettings, type StoreSchema } from './services/store';
import { errorMessage } from './utils/errors';
import { normalizeExtension } from './utils/paths';
import { createLogDisplay, reportResult } from '../renderer/log-display';
import { formatPreview } from '../renderer/preview';

const modeSchema = z.enum(['prefix', 'replace']);
const policySchema = z.enum(['case-sensitive', 'case-insensitive', 'platform']);

const runOptionsSchema = z.object({
  index: z.string().optional(),
  folder: z.string().optional(),
  ext: z.string().optional(),
  mode: modeSchema.optional(),
  delimiter: z.string().optional(),
  recursive: z.boolean().optional(),
  autoPull: z.boolean().optional(),
  casePolicy: policySchema.optional(),
  dryRun: z.boolean().optional(),
  backup: z.boolean().optional(),
  yes: z.boolean().optional(),
});

export type RunCommandOptions = z.infer<typeof runOptionsSchema>;

const scanOptionsSchema = z.object({
  ext: z.string().optional(),
  recursive: z.boolean().optional(),
  output: z.string().optional(),
});

export interface HandlerContext {
  onProgress: ProgressCallback;
  /** 实际执行前的确认，返回 false 时取消 */
  confirmRun: (message: string) => Promise<boolean>;
  loadSettings: () => Promise<StoreSchema>;
  saveSettings: (settings: Partial<StoreSchema>) => Promise<void>;
  resetSettings: () => Promise<void>;
}

/**
 * 合并命令行参数和已保存的配置，生成本次运行的不可变配置
 * 目标目录变化且未指定索引文件时，丢弃上次保存的索引路径
 */
export function buildRunConfig(options: RunCommandOptions, settings: StoreSchema): RenameRunConfig {
  const targetFolder = options.folder !== undefined ? path.resolve(options.folder) : settings.targetFolder;
  const folderChanged = targetFolder !== settings.targetFolder;

  let indexPath = settings.indexPath;
  if (options.index !== undefined) {
    indexPath = path.resolve(options.index);
  } else if (folderChanged) {
    indexPath = '';
  }

  return Object.freeze({
    indexPath,
    targetFolder,
    extension: options.ext !== undefined ? normalizeExtension(options.ext) : settings.extension,
    mode: options.mode ?? settings.mode,
    delimiter: options.delimiter ?? settings.delimiter,
    recursive: options.recursive ?? settings.recursive,
    backup: options.backup ?? settings.backup,
    dryRun: options.dryRun ?? false,
    collisionPolicy: options.casePolicy ?? settings.collisionPolicy,
  });
}

function settingsFromConfig(config: RenameRunConfig, autoPull: boolean): Partial<StoreSchema> {
  return {
    indexPath: config.indexPath,
    targetFolder: config.targetFolder,
    extension: config.extension,
    mode: config.mode,
    delimiter: config.delimiter,
    recursive: config.recursive,
    backup: config.backup,
    autoPull,
    collisionPolicy: config.collisionPolicy,
  };
}

async function prepareRun(rawOptions: unknown, context: HandlerContext) {
  const options = runOptionsSchema.parse(rawOptions);
  const settings = await context.loadSettings();
  const autoPull = options.autoPull ?? settings.autoPull;
  const config = await resolveRunConfig(buildRunConfig(options, settings), autoPull, context.onProgress);
  await context.saveSettings(settingsFromConfig(config, autoPull));
  return { options, config };
}

// 扫描目录生成模板
export async function handleScan(folder: string, rawOptions: unknown, context: HandlerContext): Promise<ToolResult> {
  try {
    const options = scanOptionsSchema.parse(rawOptions);
    const settings = await context.loadSettings();
    const extension = normalizeExtension(options.ext ?? settings.extension);
    const recursive = options.recursive ?? settings.recursive;
    const targetFolder = path.resolve(folder);

    const result = await scanAndCreateTemplate({
      folder: targetFolder,
      extension,
      recursive,
      outputPath: options.output !== undefined ? path.resolve(options.output) : undefined,
      onProgress: context.onProgress,
    });

    await context.saveSettings({ targetFolder, indexPath: result.templatePath, extension, recursive });
    return { success: true, summary: `模板已生成，共 ${result.fileCount} 个文件` };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

export async function handleBlankTemplate(output: string, context: HandlerContext): Promise<ToolResult> {
  try {
    await createBlankTemplate(path.resolve(output), context.onProgress);
    return { success: true, summary: '空白模板已生成' };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

// 预览重命名计划
export async function handlePreview(rawOptions: unknown, context: HandlerContext): Promise<ToolResult> {
  try {
    const { config } = await prepareRun(rawOptions, context);
    const preview = await previewRenames(config, { onProgress: context.onProgress });
    for (const line of formatPreview(preview.plan, preview.summary, preview.fileCount)) {
      context.onProgress(line);
    }
    return { success: true, summary: '预览完成，未修改任何文件' };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

// 执行重命名
export async function handleRun(rawOptions: unknown, context: HandlerContext): Promise<ToolResult> {
  try {
    const { options, config } = await prepareRun(rawOptions, context);

    if (!config.dryRun && !options.yes) {
      const confirmed = await context.confirmRun(
        '确定要重命名这些文件吗？未备份时无法撤销。',
      );
      if (!confirmed) {
        return { success: false, error: '已取消重命名' };
      }
    }

    const result = await renameFromIndex(config, { onProgress: context.onProgress });
    const summary = result.dryRun
      ? `预览运行完成，未修改任何文件。日志: ${result.logPath}`
      : `重命名完成：成功 ${result.renamedCount} 个，失败 ${result.errorCount} 个。日志: ${result.logPath}`;
    return { success: true, summary };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}

async function promptConfirm(message: string): Promise<boolean> {
  const value = await confirm({ message, initialValue: false });
  if (isCancel(value)) return false;
  return value;
}

export function createDefaultContext(): HandlerContext {
  return {
    onProgress: createLogDisplay(),
    confirmRun: promptConfirm,
    loadSettings: async () => loadSettings(await getStore()),
    saveSettings: async (settings) => saveSettings(await getStore(), settings),
    resetSettings: async () => resetSettings(await getStore()),
  };
}

function finish(result: ToolResult): void {
  reportResult(result);
  if (!result.success) {
    process.exitCode = 1;
  }
}

function addPlanOptions(command: Command): Command {
  return command
    .option('-i, --index <file>', 'rename index workbook (.xlsx)')
    .option('-f, --folder <dir>', 'target folder')
    .option('-e, --ext <ext>', 'file extension, e.g. .pdf')
    .addOption(new Option('-m, --mode <mode>', 'rename mode').choices(modeSchema.options))
    .option('-d, --delimiter <text>', 'delimiter between prefix and name (may be empty)')
    .option('-r, --recursive', 'include subfolders')
    .option('--no-recursive', 'only the target folder itself')
    .option('--auto-pull', 'use the newest template in the folder when no index is given')
    .option('--no-auto-pull', 'never pick a template automatically')
    .addOption(new Option('--case-policy <policy>', 'case handling for collisions').choices(policySchema.options));
}

/**
 * 注册所有命令
 */
export function createProgram(context: HandlerContext = createDefaultContext()): Command {
  const program = new Command();
  program
    .name('sheet-index-renamer')
    .description('Batch-rename files in a folder from a spreadsheet rename index')
    .showHelpAfterError();

  program
    .command('scan')
    .description('scan a folder and create a rename index template')
    .argument('<folder>', 'folder to scan')
    .option('-e, --ext <ext>', 'file extension, e.g. .pdf')
    .option('-r, --recursive', 'include subfolders')
    .option('--no-recursive', 'only the folder itself')
    .option('-o, --output <file>', 'where to save the template')
    .action(async (folder: string, options: unknown) => {
      finish(await handleScan(folder, options, context));
    });

  program
    .command('blank-template')
    .description('save a blank rename index template')
    .argument('<output>', 'where to save the template')
    .action(async (output: string) => {
      finish(await handleBlankTemplate(output, context));
    });

  addPlanOptions(program.command('preview').description('show what a run would do')).action(
    async (options: unknown) => {
      finish(await handlePreview(options, context));
    },
  );

  addPlanOptions(program.command('run').description('rename files according to the index'))
    .option('-n, --dry-run', 'write the log without renaming anything')
    .option('--backup', 'copy every listed file to a backup folder first')
    .option('--no-backup', 'skip the backup')
    .option('-y, --yes', 'do not ask for confirmation')
    .action(async (options: unknown) => {
      finish(await handleRun(options, context));
    });

  const config = program.command('config').description('show or reset saved settings');
  config
    .command('show')
    .description('print saved settings')
    .action(async () => {
      const settings = await context.loadSettings();
      for (const [key, value] of Object.entries(settings)) {
        context.onProgress(`${key}: ${JSON.stringify(value)}`);
      }
    });
  config
    .command('reset')
    .description('restore default settings')
    .action(async () => {
      await context.resetSettings();
      finish({ success: true, summary: '已恢复默认设置' });
    });

  return program;
}
