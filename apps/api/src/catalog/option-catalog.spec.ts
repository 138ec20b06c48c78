import { CATALOG_DATA } from '../../test/fixtures/rfq';
import { CatalogLoadError, CategoryNotFoundError } from '../common/errors';
import { OptionCatalog } from './option-catalog';

describe('OptionCatalog', () => {
  const catalog = OptionCatalog.fromData(CATALOG_DATA, ['Application', 'BOM Model']);

  it('returns options in workbook order', () => {
    expect(catalog.optionsFor('Application')).toEqual(['Robotic', 'SPM', 'Testing', 'Conveyor']);
    expect(catalog.categories()).toEqual(['Application', 'Type of Equipment', 'New / Modification', 'BOM Model']);
  });

  it('hands out frozen lists', () => {
    expect(Object.isFrozen(catalog.optionsFor('New / Modification'))).toBe(true);
  });

  it('throws CategoryNotFoundError for an unknown category', () => {
    expect(() => catalog.optionsFor('Paint Finish')).toThrow(CategoryNotFoundError);
    expect(() => catalog.optionsFor('toString')).toThrow(CategoryNotFoundError);
  });

  it('refuses to load without a required category', () => {
    expect(() => OptionCatalog.fromData(CATALOG_DATA, ['Application', 'Paint Finish'])).toThrow(
      'Option catalog is missing categories: "Paint Finish"',
    );
  });

  it('refuses an empty category', () => {
    const data = { options: { ...CATALOG_DATA.options, Application: [] }, bom: CATALOG_DATA.bom };

    expect(() => OptionCatalog.fromData(data)).toThrow(CatalogLoadError);
  });

  it('finds BOM rows by model, ignoring case', () => {
    expect(catalog.findBomEntry('smc mhl2')?.head).toBe('Gripper');
    expect(catalog.findBomEntry('IRB 2600')?.unitCost).toBe(1250000);
    expect(catalog.findBomEntry('KR 16')).toBeUndefined();
    expect(catalog.findBomEntry('  ')).toBeUndefined();
  });
});
