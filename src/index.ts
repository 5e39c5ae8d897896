export * from './types/roster';
export { buildOnDutyReport, OnDutyReportOptions } from './services/onDutyReportService';
export {
  RosterReportService,
  createRosterReportService,
  reportFileName,
  GeneratedReport,
  BatchResult,
  BatchFileResult
} from './services/rosterReportService';
export { normalizeRosterRows, cleanRosterRow, toRosterRecord, FIELD_RENAME_MAP } from './utils/rosterNormalizer';
export { propagateGroupLabels } from './utils/labelPropagator';
export { DutyClassifier, DutyClassification } from './utils/dutyClassifier';
export { assignShifts, determineShift } from './utils/shiftAssigner';
export { GROUP_CATEGORY_RULES, categorizeGroup, categorizeUnit, truncateGroupName } from './utils/groupCategorizer';
export { ReportRowBuilder, buildReportRows } from './utils/reportRowBuilder';
export { readRosterWorkbook } from './utils/rosterWorkbookReader';
export { extractReportDates, readReportDates } from './utils/reportMetadata';
export { buildReportWorkbook, appendSourceSheet, writeReportWorkbook } from './utils/reportWorkbookBuilder';
export { loadDutyCodeSets, createDutyCodeSets, parseDutyCodes } from './config/dutyCodes';
export { loadConfig, AppConfig } from './config';
export { AppError, ValidationError, RosterFileError, ConfigError } from './middleware/errorHandler';
