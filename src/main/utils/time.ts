function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * YYYYMMDD_HHMMSS，用于备份目录和日志文件名
 */
export function formatFileStamp(date: Date): string {
  return `${formatDateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * YYYY-MM-DD HH:MM:SS
 */
export function formatDisplayTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
