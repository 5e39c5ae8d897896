import fs from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';
import { DutyCodeSets, OnDutyReport } from '../types/roster';
import { AppConfig } from '../config';
import { loadDutyCodeSets } from '../config/dutyCodes';
import { RosterFileError } from '../middleware/errorHandler';
import { logger } from '../utils/logger';
import { readRosterWorkbook } from '../utils/rosterWorkbookReader';
import { readReportDates, ReportDates } from '../utils/reportMetadata';
import { appendSourceSheet, buildReportWorkbook, writeReportWorkbook } from '../utils/reportWorkbookBuilder';
import { formatFileStamp } from '../utils/timeUtils';
import { buildOnDutyReport } from './onDutyReportService';

export interface RosterReportSettings {
  dutyCodes: DutyCodeSets;
  groupSeparator: string;
  reservedMarkers: readonly string[];
}

export interface GenerateReportOptions {
  /** Copy the roster's own sheet into the report (default true) */
  includeSource?: boolean;
  /** Overrides the configured group separator for this run */
  groupSeparator?: string;
}

export interface GeneratedReport {
  report: OnDutyReport;
  workbook: XLSX.WorkBook;
  buffer: Buffer;
  fileName: string;
  sourceSheetName?: string;
}

export interface ProcessedFile {
  outputPath: string;
  report: OnDutyReport;
}

export interface BatchFileResult {
  input: string;
  success: boolean;
  outputPath?: string;
  anomalyCount: number;
  error?: string;
}

export interface BatchResult {
  success: boolean;
  results: BatchFileResult[];
  successCount: number;
  failureCount: number;
  totalProcessingTime: number;
}

export interface BatchOptions {
  /** Defaults to each input's own directory */
  outDir?: string;
  groupSeparator?: string;
}

export function reportFileName(reportDate: string, now: Date = new Date()): string {
  return `On_Duty_Roster_${reportDate || formatFileStamp(now)}.xlsx`;
}

export function sourceSheetTitle(reportDate: string): string {
  return reportDate ? `Roster Report ${reportDate}` : 'Roster Report';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RosterReportService {
  constructor(private readonly settings: RosterReportSettings) {}

  /**
   * Turns one roster workbook into the report workbook. Reading, date lookup and
   * layout happen here; the classification itself is pure.
   */
  async generateFromBuffer(
    data: Buffer,
    fileLabel: string,
    options: GenerateReportOptions = {}
  ): Promise<GeneratedReport> {
    const roster = readRosterWorkbook(data, fileLabel);

    let dates: ReportDates;
    try {
      dates = await readReportDates(data);
    } catch (error) {
      throw new RosterFileError(fileLabel, `unable to read page header/footer (${describeError(error)})`);
    }

    const report = buildOnDutyReport(roster.rows, {
      dutyCodes: this.settings.dutyCodes,
      groupSeparator: options.groupSeparator ?? this.settings.groupSeparator,
      reservedMarkers: this.settings.reservedMarkers,
      reportDate: dates.reportDate,
      generatedAt: dates.generatedAt
    });

    for (const anomaly of report.anomalies) {
      logger.warn(anomaly.message, {
        file: fileLabel,
        kind: anomaly.kind,
        group: anomaly.group,
        shift: anomaly.shift
      });
    }

    const workbook = buildReportWorkbook(report);
    let sourceSheetName: string | undefined;
    if (options.includeSource ?? true) {
      sourceSheetName = appendSourceSheet(workbook, roster.workbook, sourceSheetTitle(report.reportDate));
    }

    logger.info('Roster report generated', {
      file: fileLabel,
      reportDate: report.reportDate,
      ...report.summary.groupsByCategory,
      onDutyPeople: report.summary.onDutyPeople,
      anomalies: report.anomalies.length
    });

    return {
      report,
      workbook,
      buffer: writeReportWorkbook(workbook),
      fileName: reportFileName(report.reportDate),
      sourceSheetName
    };
  }

  /**
   * Reads a roster file and writes its report next to it (or into `outDir`).
   */
  async processFile(inputPath: string, options: BatchOptions = {}): Promise<ProcessedFile> {
    const fileLabel = path.basename(inputPath);

    let data: Buffer;
    try {
      data = await fs.readFile(inputPath);
    } catch (error) {
      throw new RosterFileError(fileLabel, `unable to read file (${describeError(error)})`, 400);
    }

    const generated = await this.generateFromBuffer(data, fileLabel, {
      groupSeparator: options.groupSeparator
    });

    const outDir = options.outDir ?? path.dirname(path.resolve(inputPath));
    const outputPath = path.join(outDir, generated.fileName);
    try {
      await fs.mkdir(outDir, { recursive: true });
      await fs.writeFile(outputPath, generated.buffer);
    } catch (error) {
      throw new RosterFileError(fileLabel, `unable to write report to ${outputPath} (${describeError(error)})`, 500);
    }

    logger.info(`Output file path: ${outputPath}`);
    return { outputPath, report: generated.report };
  }

  /**
   * Processes inputs strictly one after another. A failing file is logged and
   * recorded; the remaining files still run.
   */
  async processFiles(inputPaths: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const results: BatchFileResult[] = [];

    for (const inputPath of inputPaths) {
      logger.info(`Input file path: ${inputPath}`);
      try {
        const { outputPath, report } = await this.processFile(inputPath, options);
        results.push({ input: inputPath, success: true, outputPath, anomalyCount: report.anomalies.length });
      } catch (error) {
        logger.error(`Error processing ${inputPath}: ${describeError(error)}`);
        results.push({ input: inputPath, success: false, anomalyCount: 0, error: describeError(error) });
      }
    }

    const successCount = results.filter(result => result.success).length;
    const failureCount = results.length - successCount;

    return {
      success: failureCount === 0,
      results,
      successCount,
      failureCount,
      totalProcessingTime: Date.now() - startTime
    };
  }
}

export function createRosterReportService(config: Readonly<AppConfig>): RosterReportService {
  return new RosterReportService({
    dutyCodes: loadDutyCodeSets(config.roster.dutyCodesPath),
    groupSeparator: config.roster.groupSeparator,
    reservedMarkers: config.roster.reservedMarkers
  });
}
