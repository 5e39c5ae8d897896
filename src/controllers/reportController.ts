import { Request, Response } from 'express';
import { matchedData, query, validationResult } from 'express-validator';
import { asyncHandler, ValidationError } from '../middleware/errorHandler';
import { RosterReportService } from '../services/rosterReportService';
import { logger } from '../utils/logger';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
const DEFAULT_UPLOAD_NAME = 'upload.xlsx';

// Validation rules
export const generateReportValidation = [
  query('format').optional().isIn(['xlsx', 'json']).withMessage('Format must be xlsx or json'),
  query('separator').optional().isString().isLength({ min: 1, max: 3 }).withMessage('Separator must be 1-3 characters'),
  query('includeSource').optional().isBoolean().withMessage('includeSource must be true or false').toBoolean()
];

export function createReportController(service: RosterReportService) {
  const generateReport = asyncHandler(async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      throw new ValidationError('Validation failed', errors.array());
    }

    const body: unknown = req.body;
    if (!Buffer.isBuffer(body) || body.length === 0) {
      throw new ValidationError('Request body must be an .xlsx workbook');
    }

    const options = matchedData(req, { locations: ['query'] });
    const format = options.format === 'json' ? 'json' : 'xlsx';
    const separator = typeof options.separator === 'string' ? options.separator : undefined;
    const includeSource = options.includeSource !== false;
    const fileLabel = req.get('X-File-Name') || DEFAULT_UPLOAD_NAME;

    const generated = await service.generateFromBuffer(body, fileLabel, {
      groupSeparator: separator,
      includeSource
    });

    logger.info(`Report generated for upload ${fileLabel}`, { format, bytes: body.length });

    if (format === 'json') {
      const { reportDate, generatedAt, rows, anomalies, summary } = generated.report;
      res.json({ fileName: generated.fileName, reportDate, generatedAt, rows, anomalies, summary });
      return;
    }

    res.setHeader('Content-Type', XLSX_MIME_TYPE);
    res.setHeader('Content-Disposition', `attachment; filename="${generated.fileName}"`);
    res.status(200).send(generated.buffer);
  });

  return { generateReport };
}
