import { describe, it, expect } from 'vitest';
import { outcomeToJson, summaryLine } from './report.js';
import type { SelectionResult } from '../types.js';

const selection: SelectionResult = {
  included: [
    { relPath: 'userdata/a.xml', absPath: '/kodi/userdata/a.xml', size: 1024 },
    { relPath: 'addons/b.xml', absPath: '/kodi/addons/b.xml', size: 512 },
  ],
  oversized: [{ relPath: 'userdata/huge.bin', absPath: '/kodi/userdata/huge.bin', size: 200 * 1024 * 1024 }],
  excluded: 3,
  unreadable: [],
  totalBytes: 1536,
};

describe('report', () => {
  it('summarizes a selection on one line', () => {
    expect(summaryLine(selection)).toBe('files=2  bytes=1.5 KB  oversized=1  excluded=3  unreadable=0');
  });

  it('renders a preview as plain data', () => {
    const json = outcomeToJson({ kind: 'preview', selection, redacted: [] });
    expect(json.zipPath).toBeUndefined();
    expect(json.files).toEqual([
      { path: 'userdata/a.xml', bytes: 1024 },
      { path: 'addons/b.xml', bytes: 512 },
    ]);
    expect(json.oversized).toEqual([{ path: 'userdata/huge.bin', bytes: 200 * 1024 * 1024 }]);
  });

  it('includes archive details', () => {
    const json = outcomeToJson({
      kind: 'archive',
      zipPath: '/out/KodiBuild_Personal_v1.0_20240102_030405.zip',
      archiveBytes: 900,
      selection,
      redacted: [],
      dropped: ['userdata/sources.xml'],
    });
    expect(json.zipPath).toBe('/out/KodiBuild_Personal_v1.0_20240102_030405.zip');
    expect(json.archiveBytes).toBe(900);
    expect(json.dropped).toEqual(['userdata/sources.xml']);
  });
});
