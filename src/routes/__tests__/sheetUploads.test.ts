import { describe, it, expect, vi } from 'vitest';
import { decodeWorkbook } from '../formSubmissionRoutes/sheetUploads';
import { FileUploadError } from '../../lib/errors';

vi.mock('../../db/db', () => ({ db: {} }));

const encode = (text: string) => Buffer.from(text).toString('base64');

describe('decodeWorkbook', () => {
  it('decodes the payload', () => {
    expect(decodeWorkbook('Hours.XLSX', encode('PK-bytes'), 1024).toString()).toBe('PK-bytes');
  });

  it('accepts only .xlsx names', () => {
    expect(() => decodeWorkbook('hours.xls', encode('x'), 1024)).toThrow('Only .xlsx files are accepted');
  });

  it('rejects content that is not base64', () => {
    expect(() => decodeWorkbook('hours.xlsx', 'not base64!', 1024)).toThrow(FileUploadError);
  });

  it('enforces the size limit on the decoded bytes', () => {
    expect(() => decodeWorkbook('hours.xlsx', encode('0123456789'), 8)).toThrow('File exceeds the 8 byte upload limit');
    expect(decodeWorkbook('hours.xlsx', encode('01234567'), 8)).toHaveLength(8);
  });

  it('rejects an empty file', () => {
    expect(() => decodeWorkbook('hours.xlsx', '', 8)).toThrow('Uploaded file is empty');
  });
});
