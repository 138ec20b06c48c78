import * as path from 'path';
import * as os from 'os';

import { buildCatalogWorkbook, writeCatalogWorkbook } from '../../test/fixtures/catalog-workbook';
import { CatalogLoadError } from '../common/errors';
import {
  BOM_MODEL_CATEGORY,
  canonicalColumn,
  catalogFromWorkbook,
  loadCatalogWorkbook,
  parseBomGrid,
  parseOptionGrid,
  parseUnitCost,
  splitModelSpec,
} from './catalog-loader';

const EXPECTED_MODELS = ['IRB 1200', 'IRB 2600', 'S7-1200', 'S7-1500', 'SMC MHL2', 'SMC MHZ2'];

describe('catalog-loader', () => {
  it('recognises BOM headers however they are spelled', () => {
    expect(canonicalColumn('Model / Key Spec')).toBe('Model/Key Spec');
    expect(canonicalColumn('  HEAD ')).toBe('Head');
    expect(canonicalColumn('Unit\nCost (INR)')).toBe('Unit Cost');
    expect(canonicalColumn('S.No')).toBe('S.no');
    expect(canonicalColumn('Quantity')).toBe('Qty');
    expect(canonicalColumn('Remarks')).toBeUndefined();
  });

  it('splits model cells on every separator', () => {
    expect(splitModelSpec('IRB 1200 | IRB 2600')).toEqual(['IRB 1200', 'IRB 2600']);
    expect(splitModelSpec('S7-1200/S7-1500')).toEqual(['S7-1200', 'S7-1500']);
    expect(splitModelSpec('A1; B2, C3')).toEqual(['A1', 'B2', 'C3']);
    expect(splitModelSpec('FX5 I FX3')).toEqual(['FX5', 'FX3']);
    expect(splitModelSpec('  ')).toEqual([]);
  });

  it('reads costs with currency symbols and separators', () => {
    expect(parseUnitCost('₹ 1,250,000')).toBe(1250000);
    expect(parseUnitCost('85000.50')).toBe(85000.5);
    expect(parseUnitCost('on request')).toBe(0);
  });

  it('reads categories named like object members as plain columns', () => {
    const grid = [
      ['constructor', 'toString', 'Application'],
      ['Alpha', 'Beta', 'Robotic'],
      ['Alpha', '', 'SPM'],
    ];

    const categories = parseOptionGrid(grid);

    expect([...categories.entries()]).toEqual([
      ['constructor', ['Alpha']],
      ['toString', ['Beta']],
      ['Application', ['Robotic', 'SPM']],
    ]);
  });

  it('fails when no header row is found near the top', () => {
    const grid = [['Pricing'], ['Item', 'Price']];

    expect(() => parseBomGrid(grid)).toThrow(CatalogLoadError);
  });

  it('builds options and BOM rows from a workbook', () => {
    const catalog = catalogFromWorkbook(buildCatalogWorkbook(), { bomSheet: 'bom' });

    expect(catalog.options).toEqual({
      Application: ['Robotic', 'SPM', 'Testing', 'Conveyor'],
      'Type of Equipment': ['Hydraulic', 'Pneumatic', 'Servo', 'Other'],
      'New / Modification': ['New', 'Modification'],
      [BOM_MODEL_CATEGORY]: EXPECTED_MODELS,
    });
    expect(catalog.bom).toEqual([
      { head: 'Robot', description: '6-axis arm', modelSpec: 'IRB 1200 | IRB 2600', unitCost: 1250000 },
      { head: 'Gripper', description: 'Parallel gripper', modelSpec: 'SMC MHZ2; SMC MHL2', unitCost: 45000 },
      { head: 'PLC', description: 'Cell controller', modelSpec: 'S7-1200/S7-1500', unitCost: 85000.5 },
    ]);
  });

  it('loads a workbook from disk', async () => {
    const filePath = await writeCatalogWorkbook();

    const catalog = await loadCatalogWorkbook(filePath, { bomSheet: 'BOM' });

    expect(catalog.options[BOM_MODEL_CATEGORY]).toEqual(EXPECTED_MODELS);
    expect(catalog.bom).toHaveLength(3);
  });

  it('rejects a missing file', async () => {
    const missing = path.join(os.tmpdir(), 'no-such-dir', 'catalog.xlsx');

    await expect(loadCatalogWorkbook(missing, { bomSheet: 'BOM' })).rejects.toThrow(
      `Option workbook not found at ${missing}`,
    );
  });
});
