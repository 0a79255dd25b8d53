import fs from 'fs';
import type { ProgressCallback } from '@shared/types/common';
import type { ExecutionResult, FileEntry, OperationOutcome, PlannedOperation } from '@shared/types/file-rename';
import { AuditLog, type RunParameters } from './audit-log';
import { createBackup } from './backup';
import { fsProbe, hasPathSeparator } from './rename-plan';
import { renameLog } from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * 执行阶段对文件系统的访问
 */
export interface RenameFs {
  rename(from: string, to: string): void;
  exists(target: string): boolean;
  isSameFile(a: string, b: string): boolean;
}

export const nodeRenameFs: RenameFs = {
  rename: (from, to) => fs.renameSync(from, to),
  exists: (target) => fs.existsSync(target),
  isSameFile: (a, b) => fsProbe.isSameFile(a, b),
};

export interface ExecuteOptions {
  dryRun: boolean;
  run: Omit<RunParameters, 'dryRun' | 'backupPath'>;
  /** 传入时在实际执行前备份这些文件，预览模式不备份 */
  backupFiles?: readonly FileEntry[];
  now?: Date;
  fs?: RenameFs;
  onProgress?: ProgressCallback;
}

function collisionMessage(op: PlannedOperation): string {
  switch (op.collision) {
    case 'claimed':
      return `Target already claimed by an earlier row: ${op.newName}`;
    case 'invalid':
      return `Invalid target name: ${op.newName}`;
    default:
      return `Target exists: ${op.newName}`;
  }
}

/**
 * 按计划顺序执行重命名
 * 单个文件失败只记录为错误并继续，不会中断整批操作
 */
export function executePlan(plan: readonly PlannedOperation[], options: ExecuteOptions): ExecutionResult {
  const { dryRun, run, backupFiles, now = new Date(), fs: renameFs = nodeRenameFs, onProgress } = options;

  let backupPath: string | undefined;
  if (backupFiles && !dryRun) {
    onProgress?.('💾 正在备份...');
    const backup = createBackup(run.targetFolder, backupFiles, now, onProgress);
    backupPath = backup.backupPath;
    onProgress?.(`💾 备份完成: ${backup.backupPath}（成功 ${backup.copied} 个，失败 ${backup.failed} 个）`);
  }

  const auditLog = AuditLog.open({ ...run, dryRun, backupPath }, now);
  renameLog.info(`${dryRun ? '预览运行' : '重命名'}开始：共 ${plan.length} 行，日志 ${auditLog.path}`);

  const result: ExecutionResult = {
    dryRun,
    renamedCount: 0,
    plannedCount: 0,
    errorCount: 0,
    skippedCount: 0,
    outcomes: [],
    moves: new Map(),
    logPath: auditLog.path,
    backupPath,
  };

  // 当前路径 → 原始路径，用于把链式重命名归并到 moves
  const origins = new Map<string, string>();
  const totalRenames = plan.filter((op) => op.status === 'RENAME').length;
  let step = 0;

  const recordMove = (op: PlannedOperation): void => {
    const origin = origins.get(op.oldPath) ?? op.oldPath;
    origins.delete(op.oldPath);
    origins.set(op.newPath, origin);
    result.moves.set(origin, op.newPath);
  };

  const apply = (op: PlannedOperation): OperationOutcome => {
    switch (op.status) {
      case 'NO_CHANGE':
      case 'SKIP_EMPTY_KEY':
      case 'SKIP_NOT_FOUND':
        return { operation: op, outcome: 'skipped' };

      case 'COLLISION':
        return { operation: op, outcome: 'error', error: collisionMessage(op) };

      case 'RENAME':
        break;
    }

    // 规划阶段已拦截，这里只作保护
    if (hasPathSeparator(op.newName)) {
      return { operation: op, outcome: 'error', error: collisionMessage({ ...op, collision: 'invalid' }) };
    }

    if (dryRun) {
      recordMove(op);
      return { operation: op, outcome: 'planned' };
    }

    try {
      // 规划之后目标可能被外部创建
      if (renameFs.exists(op.newPath) && !renameFs.isSameFile(op.oldPath, op.newPath)) {
        return { operation: op, outcome: 'error', error: collisionMessage({ ...op, collision: 'exists' }) };
      }
      renameFs.rename(op.oldPath, op.newPath);
      recordMove(op);
      return { operation: op, outcome: 'renamed' };
    } catch (error) {
      return { operation: op, outcome: 'error', error: errorMessage(error) };
    }
  };

  for (const op of plan) {
    const outcome = apply(op);
    result.outcomes.push(outcome);
    auditLog.record(outcome);

    switch (outcome.outcome) {
      case 'renamed':
        result.renamedCount++;
        break;
      case 'planned':
        result.plannedCount++;
        break;
      case 'skipped':
        result.skippedCount++;
        break;
      case 'error':
        result.errorCount++;
        break;
    }

    if (op.status === 'RENAME') {
      step++;
      if (outcome.outcome === 'error') {
        onProgress?.(`❌ [${step}/${totalRenames}] ${op.oldName} 重命名失败: ${outcome.error}`);
      } else {
        onProgress?.(`✅ [${step}/${totalRenames}] ${op.oldName} → ${op.newName}`);
      }
    }
  }

  auditLog.finish(result);
  renameLog.info(
    `${dryRun ? '预览运行' : '重命名'}结束：成功 ${result.renamedCount}，计划 ${result.plannedCount}，` +
      `失败 ${result.errorCount}，跳过 ${result.skippedCount}`,
  );

  return result;
}
