import dayjs from 'dayjs';
import type { PresentCellValue } from '../types/roster';

const MINUTES_PER_DAY = 24 * 60;

export function minutesToTimeString(minutes: number): string {
  const normalized = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hours = Math.floor(normalized / 60);
  const mins = normalized % 60;
  return `${hours.toString().padStart(2, '0')}:${mins.toString().padStart(2, '0')}`;
}

/**
 * Convert an Excel day fraction (0.25 = 06:00) to HH:MM
 */
export function excelDecimalToTimeString(value: number): string {
  const fraction = value - Math.floor(value);
  return minutesToTimeString(Math.round(fraction * MINUTES_PER_DAY));
}

/**
 * Renders a roster time cell as HH:MM. Text cells are kept as written so that
 * shift matching sees exactly what the roster says.
 */
export function formatTimeCell(value: PresentCellValue): string {
  if (typeof value === 'number') {
    return excelDecimalToTimeString(value);
  }
  if (value instanceof Date) {
    return dayjs(value).format('HH:mm');
  }
  return String(value).trim();
}

/** Stamp used in output file names when the roster has no report date */
export function formatFileStamp(date: Date = new Date()): string {
  return dayjs(date).format('YYYY-MM-DD_HH-mm');
}
