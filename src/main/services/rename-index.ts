import fs from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import type { FileEntry, RenameIntent } from '@shared/types/file-rename';
import { renameLog } from '../utils/logger';
import { SourceUnavailableError, errorMessage } from '../utils/errors';
import { formatDateStamp, formatDisplayTime } from '../utils/time';
import { stemOf } from '../utils/paths';

export const INDEX_SHEET = 'Rename Index';
export const INSTRUCTIONS_SHEET = 'Instructions';

export const COLUMNS = {
  row: 'Row',
  current: 'Current_Filename',
  prefix: 'Prefix',
  newName: 'New_Filename',
  notes: 'Notes',
} as const;

const COLUMN_KEYS = ['row', 'current', 'prefix', 'newName', 'notes'] as const;

const MAX_COLUMN_WIDTH = 50;

export function templateFileName(now: Date = new Date()): string {
  return `sheet-index-${formatDateStamp(now)}.xlsx`;
}

/**
 * 检查索引文件是否可访问（不存在或被 Excel 等程序占用时报错）
 */
export function assertIndexAvailable(indexPath: string): void {
  if (!fs.existsSync(indexPath)) {
    throw new SourceUnavailableError(`Index file does not exist: ${indexPath}`);
  }

  let fd: number;
  try {
    fd = fs.openSync(indexPath, 'r+');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'EBUSY' || code === 'EPERM' || code === 'EACCES') {
      throw new SourceUnavailableError(
        'Index file is currently open in Excel or another program. Close the file and try again.',
      );
    }
    throw new SourceUnavailableError(`Cannot access index file: ${errorMessage(error)}`);
  }
  fs.closeSync(fd);
}

async function loadWorkbook(indexPath: string): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(indexPath);
  } catch (error) {
    throw new SourceUnavailableError(`Could not read index file: ${errorMessage(error)}`);
  }
  return workbook;
}

function headerColumns(sheet: ExcelJS.Worksheet): Map<string, number> {
  const columns = new Map<string, number>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    const header = cell.text.trim();
    if (header && !columns.has(header)) {
      columns.set(header, colNumber);
    }
  });
  return columns;
}

/**
 * 读取索引表的全部行
 * 每次调用都重新打开并完整读取文件，读取后不保留任何句柄或缓存
 */
export async function readRenameIndex(indexPath: string): Promise<RenameIntent[]> {
  assertIndexAvailable(indexPath);
  const workbook = await loadWorkbook(indexPath);

  const sheet = workbook.getWorksheet(INDEX_SHEET);
  if (!sheet) {
    throw new SourceUnavailableError(`The index file must contain a sheet named '${INDEX_SHEET}'.`);
  }

  const columns = headerColumns(sheet);
  const currentColumn = columns.get(COLUMNS.current);
  if (currentColumn === undefined) {
    throw new SourceUnavailableError(`Sheet '${INDEX_SHEET}' has no '${COLUMNS.current}' column.`);
  }

  const cellText = (row: ExcelJS.Row, header: string): string => {
    const column = columns.get(header);
    return column === undefined ? '' : row.getCell(column).text.trim();
  };

  const intents: RenameIntent[] = [];
  for (let r = 2; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    intents.push({
      rowNumber: r - 1,
      sourceKey: row.getCell(currentColumn).text.trim(),
      prefix: cellText(row, COLUMNS.prefix),
      newBase: cellText(row, COLUMNS.newName),
      note: cellText(row, COLUMNS.notes),
    });
  }

  return intents;
}

export async function hasRenameIndexSheet(filePath: string): Promise<boolean> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  return workbook.getWorksheet(INDEX_SHEET) !== undefined;
}

/**
 * 在目录中查找最新的模板：优先 sheet-index-*.xlsx，其次任意 .xlsx
 * 按修改时间倒序，返回第一个包含 Rename Index 工作表的文件
 */
export async function findLatestTemplate(folder: string): Promise<string | undefined> {
  const workbooks = fs
    .readdirSync(folder)
    .filter((name) => name.endsWith('.xlsx') && !name.startsWith('~$'))
    .map((name) => path.join(folder, name))
    .filter((filePath) => fs.statSync(filePath).isFile());

  const templates = workbooks.filter((filePath) => path.basename(filePath).startsWith('sheet-index-'));
  const candidates = (templates.length > 0 ? templates : workbooks)
    .map((filePath) => ({ filePath, mtime: fs.statSync(filePath).mtimeMs }))
    .sort((a, b) => b.mtime - a.mtime);

  for (const { filePath } of candidates) {
    try {
      if (await hasRenameIndexSheet(filePath)) {
        return filePath;
      }
    } catch (error) {
      renameLog.warn(`跳过无法读取的工作簿 ${filePath}: ${errorMessage(error)}`);
    }
  }

  return undefined;
}

interface IndexRow {
  row: number;
  current: string;
  prefix: string;
  newName: string;
  notes: string;
}

function addIndexSheet(workbook: ExcelJS.Workbook, rows: readonly IndexRow[]): void {
  const sheet = workbook.addWorksheet(INDEX_SHEET);
  sheet.columns = COLUMN_KEYS.map((key) => {
    const longest = rows.reduce((max, row) => Math.max(max, String(row[key]).length), COLUMNS[key].length);
    return { header: COLUMNS[key], key, width: Math.min(longest + 2, MAX_COLUMN_WIDTH) };
  });

  for (const row of rows) {
    sheet.addRow(row);
  }
}

function addInstructionsSheet(workbook: ExcelJS.Workbook, lines: readonly string[]): void {
  const sheet = workbook.addWorksheet(INSTRUCTIONS_SHEET);
  for (const line of lines) {
    sheet.addRow([line]);
  }
}

/**
 * 根据扫描结果生成模板：Prefix 为三位序号，New_Filename 为原文件名（不含扩展名）
 */
export async function writeScanTemplate(
  outputPath: string,
  files: readonly FileEntry[],
  extension: string,
  now: Date = new Date(),
): Promise<void> {
  const rows = files.map((file, i) => ({
    row: i + 1,
    current: file.baseName,
    prefix: String(i + 1).padStart(3, '0'),
    newName: stemOf(file.baseName, extension),
    notes: '',
  }));

  const workbook = new ExcelJS.Workbook();
  addIndexSheet(workbook, rows);
  addInstructionsSheet(workbook, [
    'SHEET INDEX RENAMER - INSTRUCTIONS',
    '',
    'CRITICAL: Column B (Current_Filename) is used to match files!',
    '',
    'HOW TO USE:',
    '1. Edit columns C, D, E as needed',
    '2. Column B: Current_Filename (MUST match existing file)',
    '3. Column C: Prefix (used in prefix mode)',
    '4. Column D: New_Filename (primary rename value)',
    '5. Column E: Notes (logged to file)',
    '',
    "IMPORTANT: Do not change Column B unless you know what you're doing!",
    '',
    'Prefix mode: <Prefix><Delimiter><Column D><ext>',
    'Replace mode: <Column D><ext>',
    '',
    `Scanned: ${files.length} files`,
    `Extension: ${extension}`,
    `Date: ${formatDisplayTime(now).slice(0, 16)}`,
  ]);

  await workbook.xlsx.writeFile(outputPath);
}

export async function writeBlankTemplate(outputPath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  addIndexSheet(
    workbook,
    ['A', 'B', 'C'].map((letter, i) => ({
      row: i + 1,
      current: `example${i + 1}.pdf`,
      prefix: String(i + 1).padStart(3, '0'),
      newName: `Document-${letter}`,
      notes: '',
    })),
  );
  addInstructionsSheet(workbook, [
    'SHEET INDEX RENAMER - BLANK TEMPLATE',
    'Fill Column B with exact filenames that exist in your folder!',
  ]);

  await workbook.xlsx.writeFile(outputPath);
}
