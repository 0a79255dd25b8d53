import pc from 'picocolors';
import type { PlannedOperation, PlanSummary } from '@shared/types/file-rename';

export type Colors = ReturnType<typeof pc.createColors>;

const WIDTH = 100;

function rowLabel(rowNumber: number): string {
  return `${String(rowNumber).padStart(3, ' ')}.`;
}

/**
 * 生成预览文本，每个元素一行
 */
export function formatPreview(
  plan: readonly PlannedOperation[],
  summary: PlanSummary,
  fileCount: number,
  colors: Colors = pc,
): string[] {
  const lines: string[] = [
    '═'.repeat(WIDTH),
    colors.bold('PREVIEW OF CHANGES (strict Current_Filename matching)'),
    '═'.repeat(WIDTH),
    '',
    `Total files in folder: ${fileCount} | Rows in index: ${summary.total}`,
    '',
    '─'.repeat(WIDTH),
    '',
  ];

  for (const op of plan) {
    const label = rowLabel(op.rowNumber);
    const indent = ' '.repeat(label.length + 1);

    switch (op.status) {
      case 'SKIP_EMPTY_KEY':
        lines.push(colors.yellow(`⚠ Row ${op.rowNumber}: Empty Current_Filename (SKIPPED)`));
        lines.push('   Fix: Column B must contain the exact existing filename', '');
        break;

      case 'SKIP_NOT_FOUND':
        lines.push(colors.yellow(`⚠ Row ${op.rowNumber}: File not found: '${op.oldName}'`));
        lines.push('   Check: Does this exact filename exist in the target folder?', '');
        break;

      case 'NO_CHANGE':
        lines.push(colors.dim(`${label} (no change) ${op.oldName}`), '');
        break;

      case 'RENAME':
        lines.push(`${label} BEFORE: ${op.oldName}`);
        lines.push(`${indent}AFTER:  ${colors.green(op.newName)}`, '');
        break;

      case 'COLLISION':
        lines.push(`${label} BEFORE: ${op.oldName}`);
        lines.push(`${indent}AFTER:  ${colors.red(op.newName)}`);
        lines.push(
          colors.red(
            op.collision === 'invalid'
              ? `${indent}⚠ WARNING: Invalid target name (contains a path separator)`
              : `${indent}⚠ WARNING: Target name collision detected`,
          ),
          '',
        );
        break;
    }
  }

  const missing = summary.emptyKey + summary.notFound;
  lines.push('─'.repeat(WIDTH), '', `Summary: ${summary.rename} file(s) will be renamed`);
  if (missing > 0) {
    lines.push(colors.yellow(`⚠ Missing/Unmatched files: ${missing}`));
    lines.push('  Action: Check Column B (Current_Filename) matches exact filenames');
  }
  if (summary.collision > 0) {
    lines.push(colors.red(`⚠ Collisions: ${summary.collision} (resolve before running)`));
  }
  if (summary.rename === 0) {
    lines.push('', colors.yellow('⚠ No files will be renamed. Check Column B values!'));
  }

  return lines;
}
