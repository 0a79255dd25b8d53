import pc from 'picocolors';
import type { ProgressCallback, ToolResult } from '@shared/types/common';
import type { Colors } from './preview';

interface Writable {
  write(chunk: string): unknown;
}

/**
 * 把服务的进度消息逐行输出到终端
 */
export function createLogDisplay(stream: Writable = process.stdout): ProgressCallback {
  return (message) => {
    stream.write(`${message}\n`);
  };
}

export function reportResult(result: ToolResult, stream: Writable = process.stderr, colors: Colors = pc): void {
  if (result.success) {
    if (result.summary) {
      stream.write(`${colors.green(result.summary)}\n`);
    }
    return;
  }
  stream.write(`${colors.red(`错误: ${result.error}`)}\n`);
}
