import { describe, expect, it, vi } from 'vitest';
import type { FileEntry, RenameIntent } from '@shared/types/file-rename';
import { buildMatchIndex, matchIntent } from './matcher';

function intent(sourceKey: string): RenameIntent {
  return { rowNumber: 1, sourceKey, prefix: '001', newBase: 'New', note: '' };
}

const files: FileEntry[] = [
  { fullPath: '/docs/invoice.pdf', baseName: 'invoice.pdf' },
  { fullPath: '/docs/scan.pdf', baseName: 'scan.pdf' },
];

describe('matchIntent', () => {
  const index = buildMatchIndex(files);

  it('matches by exact file name', () => {
    expect(matchIntent(intent('scan.pdf'), index)).toEqual({ kind: 'matched', entry: files[1] });
  });

  it('reports an empty key regardless of the other columns', () => {
    expect(matchIntent(intent(''), index)).toEqual({ kind: 'empty-key' });
  });

  it('is case-sensitive', () => {
    expect(matchIntent(intent('Invoice.pdf'), index)).toEqual({ kind: 'not-found' });
  });

  it('reports names that are not in the listing', () => {
    expect(matchIntent(intent('missing.pdf'), index)).toEqual({ kind: 'not-found' });
  });
});

describe('buildMatchIndex', () => {
  it('keeps the first entry for duplicate names', () => {
    const first = { fullPath: '/docs/a/report.pdf', baseName: 'report.pdf' };
    const second = { fullPath: '/docs/b/report.pdf', baseName: 'report.pdf' };
    const onDuplicate = vi.fn();

    const index = buildMatchIndex([first, second], onDuplicate);

    expect(index.get('report.pdf')).toBe(first);
    expect(onDuplicate).toHaveBeenCalledWith(second, first);
  });
});
