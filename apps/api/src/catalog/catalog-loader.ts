import * as fs from 'fs';
import { Workbook, Worksheet } from 'exceljs';
import type { BomEntry } from '@rfq-intake/types';

import { CatalogLoadError } from '../common/errors';
import type { CatalogData } from './option-catalog';

/** Category derived from the BOM sheet's model/spec column. */
export const BOM_MODEL_CATEGORY = 'BOM Model';

// BOM exports carry a title block; the header row sits somewhere near the top.
const HEADER_SCAN_ROWS = 20;
const MODEL_SEPARATORS = /\s*\|\s*|\s+I\s+|\/|;|,/;

type Grid = string[][];

type BomColumn = 'S.no' | 'Head' | 'Description' | 'Model/Key Spec' | 'Unit Cost' | 'Qty';

export interface CatalogLoadOptions {
  bomSheet: string;
}

export function canonicalColumn(header: string): BomColumn | undefined {
  const low = header.replace(/[\r\n]+/g, ' ').trim().toLowerCase();
  if (low.includes('head')) return 'Head';
  if (low.includes('description')) return 'Description';
  if (low.includes('model') || low.includes('key spec')) return 'Model/Key Spec';
  if (low.includes('unit') && low.includes('cost')) return 'Unit Cost';
  if (low.includes('s.no')) return 'S.no';
  if (low === 'qty' || low.includes('quantity')) return 'Qty';
  return undefined;
}

/** "IRB 1200 | IRB 2600" -> ["IRB 1200", "IRB 2600"] */
export function splitModelSpec(cell: string): string[] {
  return cell
    .split(MODEL_SEPARATORS)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Currency symbols and thousands separators are dropped; unparsable costs count as 0. */
export function parseUnitCost(text: string): number {
  const value = Number.parseFloat(text.replace(/[^\d.-]/g, ''));
  return Number.isFinite(value) ? value : 0;
}

export function parseOptionGrid(grid: Grid, into = new Map<string, string[]>()): Map<string, string[]> {
  const [header = [], ...rows] = grid;
  header.forEach((category, column) => {
    if (category.length === 0) return;
    const values = into.get(category) ?? [];
    for (const row of rows) {
      const value = row[column] ?? '';
      if (value.length > 0 && !values.includes(value)) {
        values.push(value);
      }
    }
    into.set(category, values);
  });
  return into;
}

export function parseBomGrid(grid: Grid): BomEntry[] {
  const headerIndex = grid
    .slice(0, HEADER_SCAN_ROWS)
    .findIndex((row) => {
      const columns = row.map(canonicalColumn);
      return columns.includes('Head') && columns.includes('Model/Key Spec');
    });
  if (headerIndex < 0) {
    throw new CatalogLoadError(`BOM sheet has no header row with "Head" and "Model/Key Spec" columns`);
  }

  const columnOf = new Map<BomColumn, number>();
  grid[headerIndex].forEach((header, column) => {
    const canonical = canonicalColumn(header);
    if (canonical && !columnOf.has(canonical)) {
      columnOf.set(canonical, column);
    }
  });
  const read = (row: string[], column: BomColumn): string => {
    const index = columnOf.get(column);
    return index === undefined ? '' : (row[index] ?? '');
  };

  return grid
    .slice(headerIndex + 1)
    .filter((row) => read(row, 'Head').length > 0)
    .map((row) => ({
      head: read(row, 'Head'),
      description: read(row, 'Description'),
      modelSpec: read(row, 'Model/Key Spec'),
      unitCost: parseUnitCost(read(row, 'Unit Cost')),
    }));
}

export function bomModels(entries: readonly BomEntry[]): string[] {
  const models = new Set(entries.flatMap((entry) => splitModelSpec(entry.modelSpec)));
  return [...models].sort();
}

function readGrid(worksheet: Worksheet): Grid {
  const grid: Grid = [];
  for (let r = 1; r <= worksheet.rowCount; r++) {
    const row = worksheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= worksheet.columnCount; c++) {
      cells.push(row.getCell(c).text.trim());
    }
    grid.push(cells);
  }
  return grid;
}

/**
 * Every sheet other than the BOM sheet holds one category per column with the
 * category name in the first row.
 */
export function catalogFromWorkbook(workbook: Workbook, options: CatalogLoadOptions): CatalogData {
  const categories = new Map<string, string[]>();
  let bom: BomEntry[] = [];
  for (const worksheet of workbook.worksheets) {
    const grid = readGrid(worksheet);
    if (worksheet.name.trim().toLowerCase() === options.bomSheet.trim().toLowerCase()) {
      bom = parseBomGrid(grid);
      categories.set(BOM_MODEL_CATEGORY, bomModels(bom));
    } else {
      parseOptionGrid(grid, categories);
    }
  }
  return { options: Object.fromEntries(categories), bom };
}

export async function loadCatalogWorkbook(filePath: string, options: CatalogLoadOptions): Promise<CatalogData> {
  if (!fs.existsSync(filePath)) {
    throw new CatalogLoadError(`Option workbook not found at ${filePath}`);
  }
  const workbook = new Workbook();
  try {
    await workbook.xlsx.readFile(filePath);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Option workbook ${filePath} could not be read`, [message]);
  }
  return catalogFromWorkbook(workbook, options);
}
