import fs from 'fs';
import path from 'path';
import type { CollisionPolicy, ExecutionResult, OperationOutcome, RenameMode } from '@shared/types/file-rename';
import { formatDisplayTime, formatFileStamp } from '../utils/time';

const RULE = '='.repeat(70);

export interface RunParameters {
  indexPath: string;
  targetFolder: string;
  mode: RenameMode;
  delimiter: string;
  extension: string;
  collisionPolicy: CollisionPolicy;
  dryRun: boolean;
  backupPath?: string;
}

export type RunCounts = Pick<ExecutionResult, 'renamedCount' | 'plannedCount' | 'errorCount' | 'skippedCount'>;

export function formatHeader(params: RunParameters, now: Date): string {
  const title = params.dryRun
    ? 'SHEET INDEX RENAMER - Preview Log (dry run, no files renamed)'
    : 'SHEET INDEX RENAMER - Log File';

  return [
    title,
    RULE,
    `Timestamp: ${formatDisplayTime(now)}`,
    '',
    `Index: ${params.indexPath}`,
    `Target: ${params.targetFolder}`,
    `Mode: ${params.mode} | Delimiter: '${params.delimiter}' | Extension: ${params.extension}`,
    `Matching: Strict Current_Filename (Column B) matching | Collisions: ${params.collisionPolicy}`,
    `Backup: ${params.backupPath ?? 'none'}`,
    RULE,
    '',
    '',
  ].join('\n');
}

export function formatOutcome({ operation, outcome, error }: OperationOutcome): string {
  const row = `Row ${operation.rowNumber}`;

  switch (operation.status) {
    case 'SKIP_EMPTY_KEY':
      return `⚠ ${row}: Empty Current_Filename (skipped)\n`;
    case 'SKIP_NOT_FOUND':
      return `⚠ ${row}: File not found: '${operation.oldName}' (skipped)\n`;
    case 'NO_CHANGE':
      return `○ ${row}: ${operation.oldName} (no change)\n`;
    case 'COLLISION':
    case 'RENAME':
      break;
  }

  if (outcome === 'error') {
    return `✗ ${row}: ${operation.oldName}\n  ERROR: ${error ?? 'Unknown error'}\n\n`;
  }

  let text = `✓ ${row}: ${operation.oldName}\n  → ${operation.newName}\n`;
  if (operation.note) {
    text += `  User Note: ${operation.note}\n`;
  }
  return `${text}\n`;
}

export function formatSummary(counts: RunCounts, dryRun: boolean): string {
  const lines = [
    '',
    RULE,
    'SUMMARY',
    RULE,
    `Renamed: ${counts.renamedCount} | Errors: ${counts.errorCount} | Skipped: ${counts.skippedCount}`,
  ];
  if (dryRun) {
    lines.push(`Would rename: ${counts.plannedCount}`);
  }
  const total = counts.renamedCount + counts.plannedCount + counts.errorCount + counts.skippedCount;
  lines.push(`Total processed: ${total}`, '');
  return lines.join('\n');
}

/**
 * 追加写入的运行日志，是本次操作唯一的持久记录
 * 每条结果完成后立即写入，中途异常时已写部分保留
 */
export class AuditLog {
  private constructor(
    readonly path: string,
    private readonly dryRun: boolean,
  ) {}

  static open(params: RunParameters, now: Date = new Date()): AuditLog {
    const logPath = path.join(params.targetFolder, `rename_log_${formatFileStamp(now)}.txt`);
    fs.appendFileSync(logPath, formatHeader(params, now), 'utf-8');
    return new AuditLog(logPath, params.dryRun);
  }

  record(outcome: OperationOutcome): void {
    fs.appendFileSync(this.path, formatOutcome(outcome), 'utf-8');
  }

  finish(counts: RunCounts): void {
    fs.appendFileSync(this.path, formatSummary(counts, this.dryRun), 'utf-8');
  }
}
