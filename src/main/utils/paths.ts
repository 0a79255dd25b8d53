import path from 'path';

/**
 * 只接受本地路径：拒绝 UNC / 网络路径以及包含 .. 的路径
 */
export function isLocalPath(target: string): boolean {
  if (!target) return false;
  if (target.startsWith('\\\\') || target.startsWith('//')) return false;

  const segments = target.split(/[\\/]+/);
  return !segments.includes('..');
}

/**
 * 规范化扩展名，缺少前导点时补上
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim();
  if (!trimmed) return trimmed;
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * 去掉扩展名后的文件名
 * 文件名以配置的扩展名结尾时去掉它，否则按最后一个点拆分
 */
export function stemOf(fileName: string, extension: string): string {
  if (extension && fileName.endsWith(extension) && fileName.length > extension.length) {
    return fileName.slice(0, -extension.length);
  }
  const ext = path.extname(fileName);
  return ext ? fileName.slice(0, -ext.length) : fileName;
}
