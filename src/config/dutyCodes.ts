import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { DutyCodeSets } from '../types/roster';
import { ConfigError } from '../middleware/errorHandler';
import defaultDutyCodes from './dutyCodes.json';

const codeList = z.array(z.string().min(1, 'Duty codes must not be empty'));

/**
 * Shape of a duty code file. Lists may repeat entries; they collapse into sets.
 */
export const dutyCodesFileSchema = z
  .object({
    allowed: codeList,
    disqualifying: codeList,
    generic: codeList
  })
  .refine(
    (data) => !data.allowed.some(code => data.disqualifying.includes(code)),
    {
      message: 'A code cannot be both allowed and disqualifying',
      path: ['disqualifying']
    }
  );

export type DutyCodesFile = z.infer<typeof dutyCodesFileSchema>;

export function createDutyCodeSets(file: DutyCodesFile): DutyCodeSets {
  return Object.freeze({
    allowed: new Set(file.allowed),
    disqualifying: new Set(file.disqualifying),
    generic: new Set(file.generic)
  });
}

export function parseDutyCodes(raw: unknown, source: string): DutyCodeSets {
  const result = dutyCodesFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid duty code configuration in ${source}: ${issues}`);
  }
  return createDutyCodeSets(result.data);
}

/**
 * Loads the duty code vocabulary, from `filePath` when given, else the shipped defaults.
 */
export function loadDutyCodeSets(filePath?: string): DutyCodeSets {
  if (!filePath) {
    return parseDutyCodes(defaultDutyCodes, 'dutyCodes.json');
  }

  const resolved = path.resolve(filePath);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read duty code file "${resolved}": ${reason}`);
  }
  return parseDutyCodes(raw, resolved);
}
