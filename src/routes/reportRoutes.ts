import express, { Router } from 'express';
import { createReportController, generateReportValidation, XLSX_MIME_TYPE } from '../controllers/reportController';
import { RosterReportService } from '../services/rosterReportService';

export function createReportRoutes(service: RosterReportService, uploadLimit: string): Router {
  const router = Router();
  const { generateReport } = createReportController(service);

  // The roster workbook is posted as the raw request body
  router.post(
    '/',
    express.raw({ type: [XLSX_MIME_TYPE, 'application/octet-stream'], limit: uploadLimit }),
    generateReportValidation,
    generateReport
  );

  return router;
}
