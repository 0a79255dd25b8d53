import fs from 'fs';
import path from 'path';
import type { ProgressCallback } from '@shared/types/common';
import type { ExecutionResult, PlannedOperation, PlanSummary, RenameRunConfig } from '@shared/types/file-rename';
import { listFiles } from './file-lister';
import { buildPlan, summarizePlan, type PathProbe } from './rename-plan';
import { executePlan, type RenameFs } from './rename-executor';
import { findLatestTemplate, readRenameIndex, templateFileName, writeBlankTemplate, writeScanTemplate } from './rename-index';
import { renameLog } from '../utils/logger';
import { InvalidInputError } from '../utils/errors';
import { isLocalPath, normalizeExtension } from '../utils/paths';

export interface ScanOptions {
  folder: string;
  extension: string;
  recursive?: boolean;
  /** 模板保存路径，默认为目标目录下的 sheet-index-YYYYMMDD.xlsx */
  outputPath?: string;
  now?: Date;
  onProgress?: ProgressCallback;
}

export interface ScanResult {
  templatePath: string;
  fileCount: number;
}

export interface PreviewResult {
  plan: PlannedOperation[];
  summary: PlanSummary;
  fileCount: number;
}

export interface RenameOptions {
  now?: Date;
  fs?: RenameFs;
  probe?: PathProbe;
  onProgress?: ProgressCallback;
}

function assertFolder(folder: string): void {
  if (!folder || !fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new InvalidInputError(`Please select a valid target folder: ${folder || '(none)'}`);
  }
  if (!isLocalPath(folder)) {
    throw new InvalidInputError(`Invalid or unsafe folder path: ${folder}`);
  }
}

/**
 * 扫描目录并生成重命名索引模板
 */
export async function scanAndCreateTemplate(options: ScanOptions): Promise<ScanResult> {
  const { folder, recursive = false, now = new Date(), onProgress } = options;
  const extension = normalizeExtension(options.extension);

  assertFolder(folder);
  if (!extension) {
    throw new InvalidInputError('File extension is required, e.g. .pdf');
  }

  onProgress?.('📂 正在读取目录...');
  const files = listFiles(folder, { extension, recursive });
  if (files.length === 0) {
    throw new InvalidInputError(`No ${extension} files found in ${folder}`);
  }
  onProgress?.(`📊 找到 ${files.length} 个文件`);

  const templatePath = options.outputPath ?? path.join(folder, templateFileName(now));
  if (!isLocalPath(templatePath)) {
    throw new InvalidInputError(`Invalid or unsafe template path: ${templatePath}`);
  }

  await writeScanTemplate(templatePath, files, extension, now);
  renameLog.info(`模板已生成 ${templatePath}，共 ${files.length} 个文件`);
  onProgress?.(`✅ 模板已生成: ${templatePath}`);
  onProgress?.('⚠️  B 列 (Current_Filename) 必须与现有文件名完全一致！');

  return { templatePath, fileCount: files.length };
}

export async function createBlankTemplate(outputPath: string, onProgress?: ProgressCallback): Promise<string> {
  if (!isLocalPath(outputPath)) {
    throw new InvalidInputError(`Invalid or unsafe template path: ${outputPath}`);
  }
  await writeBlankTemplate(outputPath);
  onProgress?.(`✅ 空白模板已保存: ${outputPath}`);
  return outputPath;
}

/**
 * 校验运行参数；未指定索引文件且开启 autoPull 时，从目标目录中取最新的模板
 * 返回一份新的配置，不修改传入的对象
 */
export async function resolveRunConfig(
  config: RenameRunConfig,
  autoPull: boolean,
  onProgress?: ProgressCallback,
): Promise<RenameRunConfig> {
  assertFolder(config.targetFolder);

  let indexPath = config.indexPath;
  if (!indexPath && autoPull) {
    const latest = await findLatestTemplate(config.targetFolder);
    if (latest) {
      indexPath = latest;
      onProgress?.(`📄 Auto-pulled: ${path.basename(latest)}`);
    }
  }

  if (!indexPath || !fs.existsSync(indexPath) || !fs.statSync(indexPath).isFile()) {
    throw new InvalidInputError('Please select a valid index file (.xlsx)');
  }
  if (!isLocalPath(indexPath)) {
    throw new InvalidInputError(`Invalid or unsafe index file path: ${indexPath}`);
  }
  if (!config.extension.startsWith('.')) {
    throw new InvalidInputError('File extension must start with a dot, e.g. .pdf');
  }

  return Object.freeze({ ...config, indexPath });
}

/**
 * 每次都重新读取索引表和目录，不复用上一次的结果
 */
async function planFromSources(config: RenameRunConfig, probe: PathProbe | undefined, onProgress?: ProgressCallback) {
  const intents = await readRenameIndex(config.indexPath);
  const files = listFiles(config.targetFolder, { extension: config.extension, recursive: config.recursive });
  onProgress?.(`📊 目录中文件: ${files.length} 个 | 索引表行数: ${intents.length}`);

  const plan = buildPlan(intents, files, {
    mode: config.mode,
    extension: config.extension,
    delimiter: config.delimiter,
    collisionPolicy: config.collisionPolicy,
    probe,
    onDuplicate: (ignored, kept) => {
      renameLog.warn(`同名文件 ${ignored.fullPath} 已忽略，改为匹配 ${kept.fullPath}`);
      onProgress?.(`⚠️  忽略同名文件: ${ignored.fullPath}`);
    },
  });

  return { plan, files };
}

export async function previewRenames(config: RenameRunConfig, options: RenameOptions = {}): Promise<PreviewResult> {
  const { plan, files } = await planFromSources(config, options.probe, options.onProgress);
  return { plan, summary: summarizePlan(plan), fileCount: files.length };
}

/**
 * 按索引表执行重命名
 */
export async function renameFromIndex(config: RenameRunConfig, options: RenameOptions = {}): Promise<ExecutionResult> {
  const { now, fs: renameFs, probe, onProgress } = options;

  if (config.dryRun) {
    onProgress?.('🔍 预览模式：只写日志，不会实际修改文件');
  }

  const { plan, files } = await planFromSources(config, probe, onProgress);

  const result = executePlan(plan, {
    dryRun: config.dryRun,
    run: {
      indexPath: config.indexPath,
      targetFolder: config.targetFolder,
      mode: config.mode,
      delimiter: config.delimiter,
      extension: config.extension,
      collisionPolicy: config.collisionPolicy,
    },
    backupFiles: config.backup ? files : undefined,
    now,
    fs: renameFs,
    onProgress,
  });

  onProgress?.('');
  onProgress?.('📈 执行结果:');
  if (result.dryRun) {
    onProgress?.(`   将重命名: ${result.plannedCount} 个`);
  } else {
    onProgress?.(`   成功: ${result.renamedCount} 个`);
  }
  onProgress?.(`   失败: ${result.errorCount} 个`);
  onProgress?.(`   跳过: ${result.skippedCount} 个`);
  onProgress?.(`📝 日志: ${result.logPath}`);

  return result;
}
