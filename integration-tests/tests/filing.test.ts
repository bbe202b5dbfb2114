/**
 * Filing tests: target names, collisions and category folders
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CATEGORIES, type ClassificationOutcome, type NationalIdentifier } from '@triage/shared';
import {
  buildTargetFilename,
  ensureCategoryFolders,
  fileDocument,
  fileFailedDocument,
  formatFilingDate,
  resolveUniqueFilename,
} from '../../services/worker-classifier/src/lib/filing';

const FILING_DATE = new Date(2024, 0, 5, 12, 0, 0);

function outcome(category: ClassificationOutcome['category'], identifier: NationalIdentifier | null): ClassificationOutcome {
  return { category, identifier, attempts: [] };
}

describe('formatFilingDate', () => {
  it('should format as ddmmyyyy', () => {
    expect(formatFilingDate(FILING_DATE)).toBe('05012024');
    expect(formatFilingDate(new Date(2023, 11, 31))).toBe('31122023');
  });
});

describe('resolveUniqueFilename', () => {
  it('should keep a free name', () => {
    expect(resolveUniqueFilename('a.pdf', () => false)).toBe('a.pdf');
  });

  it('should add the first free counter before the extension', () => {
    const taken = new Set(['a.pdf', 'a(1).pdf']);
    expect(resolveUniqueFilename('a.pdf', (candidate) => taken.has(candidate))).toBe('a(2).pdf');
  });

  it('should handle names without an extension', () => {
    const taken = new Set(['scan']);
    expect(resolveUniqueFilename('scan', (candidate) => taken.has(candidate))).toBe('scan(1)');
  });
});

describe('buildTargetFilename', () => {
  it('should name by identifier and date keeping the extension', () => {
    const identifier: NationalIdentifier = { kind: 'personal', value: '10000000146' };
    expect(buildTargetFilename({ identifier }, 'Tarama 1.PDF', FILING_DATE)).toBe('10000000146_05012024.PDF');
  });

  it('should omit the dot when the original has no extension', () => {
    const identifier: NationalIdentifier = { kind: 'tax', value: '1234567899' };
    expect(buildTargetFilename({ identifier }, 'scan', FILING_DATE)).toBe('1234567899_05012024');
  });

  it('should keep the normalized original name without an identifier', () => {
    expect(buildTargetFilename({ identifier: null }, 'ﬁle.pdf', FILING_DATE)).toBe('file.pdf');
  });
});

describe('filing on disk', () => {
  let root: string;
  let inbox: string;
  let uploadRoot: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'filing-'));
    inbox = path.join(root, 'inbox');
    uploadRoot = path.join(root, 'uploads');
    fs.mkdirSync(inbox);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function dropFile(name: string, content = 'scan'): string {
    const filePath = path.join(inbox, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('should create a folder for every category', () => {
    ensureCategoryFolders(uploadRoot);
    expect(fs.readdirSync(uploadRoot).sort()).toEqual([...CATEGORIES].sort());
  });

  it('should move a document into its category folder under the identifier name', () => {
    const source = dropFile('scan.pdf', 'first');

    const filed = fileDocument(source, outcome('invoice', { kind: 'personal', value: '10000000146' }), {
      uploadRoot,
      now: () => FILING_DATE,
    });

    expect(filed).toEqual({
      category: 'invoice',
      filename: '10000000146_05012024.pdf',
      targetPath: path.join(uploadRoot, 'invoice', '10000000146_05012024.pdf'),
    });
    expect(fs.existsSync(source)).toBe(false);
    expect(fs.readFileSync(filed.targetPath, 'utf-8')).toBe('first');
  });

  it('should not overwrite an earlier document with the same identifier', () => {
    const options = { uploadRoot, now: () => FILING_DATE };
    const identified = outcome('invoice', { kind: 'personal', value: '10000000146' });

    const first = fileDocument(dropFile('a.pdf', 'first'), identified, options);
    const second = fileDocument(dropFile('b.pdf', 'second'), identified, options);

    expect(first.filename).toBe('10000000146_05012024.pdf');
    expect(second.filename).toBe('10000000146_05012024(1).pdf');
    expect(fs.readFileSync(first.targetPath, 'utf-8')).toBe('first');
    expect(fs.readFileSync(second.targetPath, 'utf-8')).toBe('second');
  });

  it('should keep the original name when there is no identifier', () => {
    const filed = fileDocument(dropFile('lorem.png'), outcome('unclassified', null), { uploadRoot });

    expect(filed.targetPath).toBe(path.join(uploadRoot, 'unclassified', 'lorem.png'));
  });

  it('should move failed documents into the processing-error folder', () => {
    const filed = fileFailedDocument(dropFile('broken.pdf'), { uploadRoot });

    expect(filed.category).toBe('processing-error');
    expect(filed.targetPath).toBe(path.join(uploadRoot, 'processing-error', 'broken.pdf'));
    expect(fs.existsSync(filed.targetPath)).toBe(true);
  });

  it('should raise a filing error when the source is gone', () => {
    expect(() => fileFailedDocument(path.join(inbox, 'absent.pdf'), { uploadRoot })).toThrow(
      `Could not move ${path.join(inbox, 'absent.pdf')} into ${path.join(uploadRoot, 'processing-error')}`
    );
  });
});
