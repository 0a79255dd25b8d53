import fs from 'fs';
import path from 'path';
import type { FileEntry } from '@shared/types/file-rename';

/** 本工具生成的备份目录，递归扫描时跳过 */
export const BACKUP_DIR_PATTERN = /^backup_\d{8}_\d{6}$/;

export interface ListFilesOptions {
  extension: string;
  recursive?: boolean;
}

function walk(dir: string, extension: string, recursive: boolean, out: string[]): void {
  for (const dirent of fs.readdirSync(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, dirent.name);

    if (dirent.isDirectory()) {
      if (recursive && !BACKUP_DIR_PATTERN.test(dirent.name)) {
        walk(fullPath, extension, recursive, out);
      }
      continue;
    }

    // 扩展名按后缀区分大小写匹配
    if (dirent.isFile() && dirent.name.endsWith(extension)) {
      out.push(fullPath);
    }
  }
}

/**
 * 列出目录下以指定扩展名结尾的文件，按路径排序
 * 每次规划和执行前都必须重新调用，不缓存结果
 */
export function listFiles(folder: string, options: ListFilesOptions): FileEntry[] {
  const { extension, recursive = false } = options;

  if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new Error(`Target folder does not exist: ${folder}`);
  }

  const paths: string[] = [];
  walk(folder, extension, recursive, paths);
  paths.sort();

  return paths.map((fullPath) => ({ fullPath, baseName: path.basename(fullPath) }));
}
