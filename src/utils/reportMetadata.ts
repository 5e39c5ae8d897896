import JSZip from 'jszip';

export interface HeaderFooterText {
  header: string;
  footer: string;
}

export interface ReportDates {
  /** MM-DD-YYYY, empty when the header carries none */
  reportDate: string;
  /** MM-DD-YYYY HH:MM:SS, empty when the footer carries none */
  generatedAt: string;
}

const REPORT_DATE_PATTERN = /\[(\d{2}\/\d{2}\/\d{4})\]/;
const GENERATED_AT_PATTERN = /(\d{2}\/\d{2}\/\d{4}\s+\d{2}:\d{2}:\d{2})/;
const DEFAULT_FIRST_SHEET = 'xl/worksheets/sheet1.xml';

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|\w+);/g, (entity, body: string) => {
    if (body.startsWith('#x')) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return String.fromCodePoint(parseInt(body.slice(1), 10));
    return XML_ENTITIES[body] ?? entity;
  });
}

/**
 * Returns the centre part of an Excel header/footer string. Text without any
 * section code is centred by Excel, so it is returned whole.
 */
export function centerSection(text: string): string {
  const start = text.indexOf('&C');
  if (start === -1) {
    return /&[LR]/.test(text) ? '' : text;
  }
  const rest = text.slice(start + 2);
  const end = rest.search(/&[LR]/);
  return end === -1 ? rest : rest.slice(0, end);
}

export function extractReportDates(header: string, footer: string): ReportDates {
  const dateMatch = centerSection(header).match(REPORT_DATE_PATTERN);
  const generatedMatch = centerSection(footer).match(GENERATED_AT_PATTERN);

  return {
    reportDate: dateMatch ? dateMatch[1].replace(/\//g, '-') : '',
    generatedAt: generatedMatch ? generatedMatch[1].replace(/\//g, '-') : ''
  };
}

function readAttribute(tag: string, attribute: string): string | undefined {
  const match = tag.match(new RegExp(`\\s${attribute}="([^"]*)"`));
  return match ? match[1] : undefined;
}

/**
 * Resolves the part name of the first worksheet through workbook.xml and its relationships.
 */
async function resolveFirstSheetPath(zip: JSZip): Promise<string> {
  const workbookXml = await zip.file('xl/workbook.xml')?.async('string');
  const relsXml = await zip.file('xl/_rels/workbook.xml.rels')?.async('string');
  if (!workbookXml || !relsXml) {
    return DEFAULT_FIRST_SHEET;
  }

  const sheetTag = workbookXml.match(/<(?:\w+:)?sheet\s[^>]*>/);
  const relationshipId = sheetTag ? readAttribute(sheetTag[0], '(?:\\w+:)?id') : undefined;
  if (!relationshipId) {
    return DEFAULT_FIRST_SHEET;
  }

  for (const relationship of relsXml.match(/<(?:\w+:)?Relationship\s[^>]*>/g) ?? []) {
    if (readAttribute(relationship, 'Id') !== relationshipId) continue;
    const target = readAttribute(relationship, 'Target');
    if (!target) break;
    return target.startsWith('/') ? target.slice(1) : `xl/${target}`;
  }

  return DEFAULT_FIRST_SHEET;
}

function readHeaderFooterElement(sheetXml: string, element: 'oddHeader' | 'oddFooter'): string {
  const match = sheetXml.match(new RegExp(`<(?:\\w+:)?${element}[^>]*>([\\s\\S]*?)</(?:\\w+:)?${element}>`));
  return match ? decodeXmlEntities(match[1]) : '';
}

/**
 * Reads the page header and footer of the first worksheet straight from the .xlsx package.
 */
export async function readHeaderFooter(data: Buffer): Promise<HeaderFooterText> {
  const zip = await JSZip.loadAsync(data);
  const sheetPath = await resolveFirstSheetPath(zip);
  const sheetXml = await zip.file(sheetPath)?.async('string');
  if (!sheetXml) {
    return { header: '', footer: '' };
  }

  return {
    header: readHeaderFooterElement(sheetXml, 'oddHeader'),
    footer: readHeaderFooterElement(sheetXml, 'oddFooter')
  };
}

export async function readReportDates(data: Buffer): Promise<ReportDates> {
  const { header, footer } = await readHeaderFooter(data);
  return extractReportDates(header, footer);
}
