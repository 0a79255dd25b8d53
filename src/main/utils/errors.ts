/**
 * 索引表不可用：文件不存在、被其他程序占用、缺少工作表或必需列
 * 在规划开始之前抛出，终止本次运行
 */
export class SourceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * 用户输入无效：目录、扩展名或路径不合法
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
