import fs from 'fs';
import path from 'path';
import type {
  CollisionPolicy,
  FileEntry,
  PlannedOperation,
  PlanSummary,
  RenameIntent,
  RenameMode,
} from '@shared/types/file-rename';
import { buildMatchIndex, matchIntent } from './matcher';
import { generateName } from './name-generator';

/**
 * 规划阶段对文件系统的只读访问
 */
export interface PathProbe {
  /** 目录下的所有条目名，目录不存在时返回空数组 */
  readNames(dir: string): string[];
  /** 两个路径是否指向同一个文件 */
  isSameFile(a: string, b: string): boolean;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export const fsProbe: PathProbe = {
  readNames(dir) {
    try {
      return fs.readdirSync(dir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  },

  isSameFile(a, b) {
    try {
      const statA = fs.statSync(a, { bigint: true });
      const statB = fs.statSync(b, { bigint: true });
      return statA.dev === statB.dev && statA.ino === statB.ino;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  },
};

export function hasPathSeparator(name: string): boolean {
  return /[\\/]/.test(name);
}

export interface PlanOptions {
  mode: RenameMode;
  extension: string;
  delimiter: string;
  collisionPolicy?: CollisionPolicy;
  probe?: PathProbe;
  platform?: NodeJS.Platform;
  onDuplicate?: (ignored: FileEntry, kept: FileEntry) => void;
}

export function isCaseSensitive(policy: CollisionPolicy, platform: NodeJS.Platform = process.platform): boolean {
  switch (policy) {
    case 'case-sensitive':
      return true;
    case 'case-insensitive':
      return false;
    case 'platform':
      return platform !== 'win32' && platform !== 'darwin';
  }
}

/**
 * 生成重命名计划，不修改文件系统
 *
 * 按行顺序处理：先占用目标名的行获胜，之后指向同一目标的行标记为 COLLISION。
 * 计划内已重命名的文件会更新匹配索引，后续行看到的是重命名之后的状态。
 */
export function buildPlan(
  intents: readonly RenameIntent[],
  files: readonly FileEntry[],
  options: PlanOptions,
): PlannedOperation[] {
  const { mode, extension, delimiter, collisionPolicy = 'platform', probe = fsProbe, platform } = options;

  const caseSensitive = isCaseSensitive(collisionPolicy, platform);
  const fold = (value: string): string => (caseSensitive ? value : value.toLowerCase());

  const index = buildMatchIndex(files, options.onDuplicate);
  // 本次规划中已被占用的目标路径，以及已被移走的原路径
  const claimed = new Set<string>();
  const vacated = new Set<string>();
  const dirNames = new Map<string, string[]>();

  const namesIn = (dir: string): string[] => {
    let names = dirNames.get(dir);
    if (!names) {
      names = probe.readNames(dir);
      dirNames.set(dir, names);
    }
    return names;
  };

  const occupiedByOther = (oldPath: string, dir: string, newName: string): boolean => {
    const wanted = fold(newName);
    for (const name of namesIn(dir)) {
      if (fold(name) !== wanted) continue;

      const candidate = path.join(dir, name);
      if (vacated.has(fold(candidate))) continue;
      if (probe.isSameFile(oldPath, candidate)) continue;
      return true;
    }
    return false;
  };

  const plan: PlannedOperation[] = [];

  for (const intent of intents) {
    const { rowNumber, note } = intent;
    const match = matchIntent(intent, index);

    if (match.kind === 'empty-key') {
      plan.push({ rowNumber, note, oldName: '', newName: '', oldPath: '', newPath: '', status: 'SKIP_EMPTY_KEY' });
      continue;
    }

    if (match.kind === 'not-found') {
      plan.push({
        rowNumber,
        note,
        oldName: intent.sourceKey,
        newName: '',
        oldPath: '',
        newPath: '',
        status: 'SKIP_NOT_FOUND',
      });
      continue;
    }

    const { baseName: oldName, fullPath: oldPath } = match.entry;
    const newName = generateName(intent, oldName, mode, extension, delimiter);
    const dir = path.dirname(oldPath);
    const newPath = path.join(dir, newName);
    const base = { rowNumber, note, oldName, newName, oldPath };

    if (newName === oldName) {
      plan.push({ ...base, newPath: oldPath, status: 'NO_CHANGE' });
      continue;
    }

    // 不占用也不释放任何名字
    if (hasPathSeparator(newName)) {
      plan.push({ ...base, newPath, status: 'COLLISION', collision: 'invalid' });
      continue;
    }

    if (claimed.has(fold(newPath))) {
      plan.push({ ...base, newPath, status: 'COLLISION', collision: 'claimed' });
      continue;
    }

    if (occupiedByOther(oldPath, dir, newName)) {
      plan.push({ ...base, newPath, status: 'COLLISION', collision: 'exists' });
      continue;
    }

    plan.push({ ...base, newPath, status: 'RENAME' });

    claimed.delete(fold(oldPath));
    claimed.add(fold(newPath));
    vacated.add(fold(oldPath));
    vacated.delete(fold(newPath));

    index.delete(oldName);
    if (!index.has(newName)) {
      index.set(newName, { fullPath: newPath, baseName: newName });
    }
  }

  return plan;
}

export function summarizePlan(plan: readonly PlannedOperation[]): PlanSummary {
  const summary: PlanSummary = { total: plan.length, rename: 0, noChange: 0, emptyKey: 0, notFound: 0, collision: 0 };

  for (const op of plan) {
    switch (op.status) {
      case 'RENAME':
        summary.rename++;
        break;
      case 'NO_CHANGE':
        summary.noChange++;
        break;
      case 'SKIP_EMPTY_KEY':
        summary.emptyKey++;
        break;
      case 'SKIP_NOT_FOUND':
        summary.notFound++;
        break;
      case 'COLLISION':
        summary.collision++;
        break;
    }
  }

  return summary;
}
