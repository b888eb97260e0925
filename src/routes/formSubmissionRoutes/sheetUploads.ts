// server/src/routes/formSubmissionRoutes/sheetUploads.ts
import { Request, Response, Express } from 'express';
import { z } from 'zod';
import { getConfig } from '../../config/env';
import { verifyToken } from '../../middleware/verifyToken';
import { FileUploadError } from '../../lib/errors';
import { sendError, zodDetails } from '../../lib/respond';
import { SheetParser } from '../../services/sheetParser';
import { importProductionBatch } from '../../services/productionImport';
import { importWorklogBatch } from '../../services/worklogImport';

const uploadSchema = z.object({
  fileName: z.string().trim().min(1, 'fileName is required'),
  contentBase64: z.string().min(1, 'contentBase64 is required'),
});

const productionUploadSchema = uploadSchema.extend({
  filterMonth: z.string().trim().optional(),
});

const BASE64_RE = /^[A-Za-z0-9+/\r\n]*={0,2}\s*$/;

/** Checks the file name and size, and turns the base64 payload into the workbook bytes. */
export function decodeWorkbook(fileName: string, contentBase64: string, maxBytes: number): Buffer {
  if (!fileName.toLowerCase().endsWith('.xlsx')) {
    throw new FileUploadError('Only .xlsx files are accepted', { fileName });
  }
  if (!BASE64_RE.test(contentBase64)) {
    throw new FileUploadError('contentBase64 is not valid base64', { fileName });
  }

  const buffer = Buffer.from(contentBase64, 'base64');
  if (buffer.length === 0) throw new FileUploadError('Uploaded file is empty', { fileName });
  if (buffer.length > maxBytes) {
    throw new FileUploadError(`File exceeds the ${maxBytes} byte upload limit`, { fileName, size: buffer.length, maxBytes });
  }
  return buffer;
}

export default function setupSheetUploadRoutes(app: Express) {
  const parser = new SheetParser();

  // --------------------------------------------------
  // ORDER SHEET
  // --------------------------------------------------
  app.post('/api/upload/production', verifyToken, async (req: Request, res: Response) => {
    try {
      const parsed = productionUploadSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: 'Invalid upload payload', details: zodDetails(parsed.error) });
      }

      const config = getConfig();
      const { fileName, contentBase64, filterMonth } = parsed.data;
      const buffer = decodeWorkbook(fileName, contentBase64, config.maxUploadBytes);

      const rows = await parser.parseProductionSheet(buffer, {
        filterMonth: filterMonth || undefined,
        offsetMinutes: config.businessUtcOffsetMinutes,
      });
      console.log(`📄 ${fileName}: ${rows.length} order rows parsed`);

      const summary = await importProductionBatch(rows);
      return res.status(201).json({
        success: true,
        message: `Imported ${summary.inserted} of ${summary.received} production rows from ${fileName}.`,
        data: { fileName, ...summary },
      });
    } catch (error) {
      return sendError(res, error, 'Production sheet upload');
    }
  });

  // --------------------------------------------------
  // WORKLOG WORKBOOK
  // --------------------------------------------------
  app.post('/api/upload/worklog', verifyToken, async (req: Request, res: Response) => {
    try {
      const parsed = uploadSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, error: 'Invalid upload payload', details: zodDetails(parsed.error) });
      }

      const config = getConfig();
      const { fileName, contentBase64 } = parsed.data;
      const buffer = decodeWorkbook(fileName, contentBase64, config.maxUploadBytes);

      const rows = await parser.parseWorklogWorkbook(buffer, { offsetMinutes: config.businessUtcOffsetMinutes });
      if (rows.length === 0) {
        throw new FileUploadError('No worklog rows found; each sheet needs a 编号 header row', { fileName });
      }
      console.log(`📄 ${fileName}: ${rows.length} worklog rows parsed`);

      const summary = await importWorklogBatch(rows);
      return res.status(201).json({
        success: true,
        message: `Stored ${summary.inserted} of ${summary.received} worklog rows from ${fileName}.`,
        data: { fileName, ...summary },
      });
    } catch (error) {
      return sendError(res, error, 'Worklog sheet upload');
    }
  });

  console.log('✅ Sheet upload endpoints setup complete');
}
