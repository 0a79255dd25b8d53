/**
 * 按表重命名相关类型定义
 * 在核心服务、CLI 和终端展示之间共享
 */

export type RenameMode = 'prefix' | 'replace';

/**
 * 冲突判定时文件名的大小写策略
 * platform: win32 / darwin 视为大小写不敏感，其余平台敏感
 */
export type CollisionPolicy = 'case-sensitive' | 'case-insensitive' | 'platform';

/**
 * 重命名索引表中的一行
 */
export interface RenameIntent {
  readonly rowNumber: number;
  /** Current_Filename 列，唯一的匹配键 */
  readonly sourceKey: string;
  readonly prefix: string;
  readonly newBase: string;
  readonly note: string;
}

export interface FileEntry {
  readonly fullPath: string;
  readonly baseName: string;
}

export type PlannedStatus = 'RENAME' | 'NO_CHANGE' | 'SKIP_EMPTY_KEY' | 'SKIP_NOT_FOUND' | 'COLLISION';

/**
 * claimed: 目标名已被前面的行占用
 * exists: 目标位置已有其他文件
 * invalid: 新文件名包含路径分隔符
 */
export type CollisionKind = 'claimed' | 'exists' | 'invalid';

export interface PlannedOperation {
  readonly rowNumber: number;
  readonly oldName: string;
  readonly newName: string;
  readonly oldPath: string;
  readonly newPath: string;
  readonly note: string;
  readonly status: PlannedStatus;
  readonly collision?: CollisionKind;
}

export type OutcomeKind = 'renamed' | 'planned' | 'skipped' | 'error';

export interface OperationOutcome {
  operation: PlannedOperation;
  outcome: OutcomeKind;
  error?: string;
}

export interface ExecutionResult {
  dryRun: boolean;
  renamedCount: number;
  /** 预览模式下将被重命名的数量，实际执行时恒为 0 */
  plannedCount: number;
  errorCount: number;
  skippedCount: number;
  outcomes: OperationOutcome[];
  /** 原始路径 → 本次执行后的路径 */
  moves: Map<string, string>;
  logPath: string;
  backupPath?: string;
}

export interface PlanSummary {
  total: number;
  rename: number;
  noChange: number;
  emptyKey: number;
  notFound: number;
  collision: number;
}

/**
 * 单次运行的参数，每次命令都重新构建，不在运行之间共享
 */
export interface RenameRunConfig {
  readonly indexPath: string;
  readonly targetFolder: string;
  readonly extension: string;
  readonly mode: RenameMode;
  readonly delimiter: string;
  readonly recursive: boolean;
  readonly backup: boolean;
  readonly dryRun: boolean;
  readonly collisionPolicy: CollisionPolicy;
}
