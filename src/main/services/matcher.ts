import type { FileEntry, RenameIntent } from '@shared/types/file-rename';

export type MatchResult =
  | { kind: 'matched'; entry: FileEntry }
  | { kind: 'empty-key' }
  | { kind: 'not-found' };

/**
 * 建立 文件名 → 文件 的匹配索引
 * 递归扫描时可能出现同名文件，保留排序后的第一个，其余通过 onDuplicate 报告
 */
export function buildMatchIndex(
  files: readonly FileEntry[],
  onDuplicate?: (ignored: FileEntry, kept: FileEntry) => void,
): Map<string, FileEntry> {
  const index = new Map<string, FileEntry>();

  for (const entry of files) {
    const existing = index.get(entry.baseName);
    if (existing) {
      onDuplicate?.(entry, existing);
      continue;
    }
    index.set(entry.baseName, entry);
  }

  return index;
}

/**
 * 严格按 Current_Filename 匹配文件（区分大小写，不按行号回退）
 */
export function matchIntent(intent: RenameIntent, index: ReadonlyMap<string, FileEntry>): MatchResult {
  if (!intent.sourceKey) {
    return { kind: 'empty-key' };
  }

  const entry = index.get(intent.sourceKey);
  return entry ? { kind: 'matched', entry } : { kind: 'not-found' };
}
