import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import { log } from '@/lib/platform/logger';
import type { Sheet } from './report';

/** CSV text for one sheet, header row first, no trailing newline. */
export function sheetToCSV(sheet: Sheet): string {
  const text = Papa.unparse(
    { fields: sheet.columns, data: sheet.rows },
    { newline: '\n' }
  );
  // unparse ends a header-only sheet with a newline
  return text.replace(/\n$/, '');
}

export function sheetFileName(sheet: Sheet): string {
  return `${sheet.name}.csv`;
}

/**
 * Write every sheet as `<name>.csv` in `outDir`, creating the directory
 * if needed. Returns the written paths in sheet order.
 */
export async function writeReport(sheets: Sheet[], outDir: string): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const sheet of sheets) {
    const file = path.join(outDir, sheetFileName(sheet));
    await writeFile(file, sheetToCSV(sheet), 'utf-8');
    written.push(file);
  }

  log.info('seating.export', 'Report written', { outDir, files: written.length });
  return written;
}
