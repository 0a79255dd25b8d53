import pc from 'picocolors';
import { describe, expect, it } from 'vitest';
import { createLogDisplay, reportResult } from './log-display';

function collect() {
  const chunks: string[] = [];
  return { chunks, stream: { write: (chunk: string) => chunks.push(chunk) } };
}

describe('log display', () => {
  it('writes each progress message on its own line', () => {
    const { chunks, stream } = collect();
    const display = createLogDisplay(stream);

    display('📂 正在读取目录...');
    display('');

    expect(chunks).toEqual(['📂 正在读取目录...\n', '\n']);
  });

  it('reports success and failure', () => {
    const { chunks, stream } = collect();
    const plain = pc.createColors(false);

    reportResult({ success: true, summary: '空白模板已生成' }, stream, plain);
    reportResult({ success: false, error: '已取消重命名' }, stream, plain);

    expect(chunks).toEqual(['空白模板已生成\n', '错误: 已取消重命名\n']);
  });
});
