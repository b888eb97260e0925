// server/src/app.ts
import express, { Express, NextFunction, Request, Response } from 'express';
import { getConfig } from './config/env';
import { sendError } from './lib/respond';

import setupAuthRoutes from './routes/auth';
import setupProductionInfoRoutes from './routes/dataFetchingRoutes/productionInfo';
import setupWorklogRoutes from './routes/dataFetchingRoutes/worklogs';
import setupProductionInfoImportRoute from './routes/formSubmissionRoutes/productionInfoImport';
import setupWorklogImportRoute from './routes/formSubmissionRoutes/worklogImport';
import setupSheetUploadRoutes from './routes/formSubmissionRoutes/sheetUploads';
import setupWorklogValidationRoutes from './routes/updateRoutes/worklogValidation';

// base64 grows a file by 4/3; leave room for the rest of the JSON body
const JSON_OVERHEAD_BYTES = 64 * 1024;

const bodyParserErrorType = (err: unknown): string | undefined =>
  typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string' ? err.type : undefined;

export function createApp(): Express {
  const config = getConfig();
  const app = express();

  app.use(express.json({ limit: Math.ceil((config.maxUploadBytes * 4) / 3) + JSON_OVERHEAD_BYTES }));

  app.get('/', (_req: Request, res: Response) => {
    res.json({ name: config.appName, version: config.appVersion });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  // --- Auth ---
  setupAuthRoutes(app);

  // --- Data fetching ---
  setupProductionInfoRoutes(app);
  setupWorklogRoutes(app);

  // --- Imports ---
  setupProductionInfoImportRoute(app);
  setupWorklogImportRoute(app);
  setupSheetUploadRoutes(app);

  // --- Validation ---
  setupWorklogValidationRoutes(app);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, error: `Route not found: ${req.method} ${req.path}` });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type === 'entity.parse.failed') {
      return res.status(400).json({ success: false, error: 'Request body is not valid JSON' });
    }
    if (type === 'entity.too.large') {
      return res.status(413).json({ success: false, error: 'Request body is too large' });
    }
    return sendError(res, err, 'Request');
  });

  return app;
}
