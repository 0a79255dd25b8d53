import fs from 'fs';
import path from 'path';
import type { FileEntry } from '@shared/types/file-rename';
import type { ProgressCallback } from '@shared/types/common';
import { renameLog } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { formatFileStamp } from '../utils/time';

export interface BackupResult {
  backupPath: string;
  copied: number;
  failed: number;
}

/**
 * 在目标目录下创建 backup_YYYYMMDD_HHMMSS，复制列表中的全部文件
 * 保留相对路径和修改时间；单个文件失败只记录，不中断
 */
export function createBackup(
  targetFolder: string,
  files: readonly FileEntry[],
  now: Date = new Date(),
  onProgress?: ProgressCallback,
): BackupResult {
  const backupPath = path.join(targetFolder, `backup_${formatFileStamp(now)}`);
  fs.mkdirSync(backupPath, { recursive: true });

  let copied = 0;
  let failed = 0;

  for (const file of files) {
    const relative = path.relative(targetFolder, file.fullPath);
    const destination = path.join(backupPath, relative);

    try {
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      fs.copyFileSync(file.fullPath, destination);
      const stats = fs.statSync(file.fullPath);
      fs.utimesSync(destination, stats.atime, stats.mtime);
      copied++;
    } catch (error) {
      failed++;
      renameLog.warn(`备份失败 ${file.fullPath}: ${errorMessage(error)}`);
      onProgress?.(`⚠️  备份失败: ${relative}（${errorMessage(error)}）`);
    }
  }

  renameLog.info(`备份完成 ${backupPath}：成功 ${copied} 个，失败 ${failed} 个`);
  return { backupPath, copied, failed };
}
