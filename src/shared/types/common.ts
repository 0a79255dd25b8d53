/**
 * 进度回调
 */
export type ProgressCallback = (message: string) => void;

/**
 * 工具函数的基础返回结果
 */
export type ToolResult =
  | {
      success: true;
      summary?: string;
      error?: never;
    }
  | {
      success: false;
      summary?: never;
      error: string;
    };
