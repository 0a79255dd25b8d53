import type { RenameIntent, RenameMode } from '@shared/types/file-rename';
import { stemOf } from '../utils/paths';

/**
 * 根据模式和索引行生成新文件名
 *
 * prefix 模式：有前缀时为 `前缀 + 分隔符 + (New_Filename || 原文件名)`，无前缀时不使用分隔符
 * replace 模式：`New_Filename || 原文件名`
 *
 * 分隔符可以是空字符串，此时前缀直接拼接
 */
export function generateName(
  intent: Pick<RenameIntent, 'prefix' | 'newBase'>,
  matchedBaseName: string,
  mode: RenameMode,
  extension: string,
  delimiter: string,
): string {
  const base = intent.newBase || stemOf(matchedBaseName, extension);

  const stem = mode === 'prefix' && intent.prefix ? `${intent.prefix}${delimiter}${base}` : base;

  if (extension && stem.endsWith(extension)) {
    return stem;
  }
  return `${stem}${extension}`;
}
