import type { BomEntry } from '@rfq-intake/types';
import { BomEntrySchema, CatalogSchema } from '@rfq-intake/validation';

import { CatalogLoadError, CategoryNotFoundError } from '../common/errors';

export interface CatalogData {
  options: Record<string, string[]>;
  bom: BomEntry[];
}

/**
 * Read-only option lists keyed by category, plus the priced BOM rows.
 *
 * Built once at startup and shared by every session; nothing mutates it
 * afterwards, so concurrent reads need no locking.
 */
export class OptionCatalog {
  private constructor(
    private readonly options: ReadonlyMap<string, readonly string[]>,
    private readonly bom: readonly BomEntry[],
  ) {}

  /**
   * Validates `data` and checks that every category in `required` is present.
   * Throws CatalogLoadError otherwise; there is no partially loaded catalog.
   */
  static fromData(data: CatalogData, required: readonly string[] = []): OptionCatalog {
    const parsed = CatalogSchema.safeParse(data.options);
    if (!parsed.success) {
      throw new CatalogLoadError(
        'Option catalog does not match its schema',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    const bomIssues = data.bom.flatMap((entry, index) => {
      const result = BomEntrySchema.safeParse(entry);
      return result.success ? [] : [`bom[${index}]: ${result.error.issues[0]?.message ?? 'invalid row'}`];
    });
    if (bomIssues.length > 0) {
      throw new CatalogLoadError('BOM rows do not match their schema', bomIssues);
    }

    const missing = required.filter((category) => !Object.prototype.hasOwnProperty.call(parsed.data, category));
    if (missing.length > 0) {
      throw new CatalogLoadError(
        'Option catalog is missing categories',
        missing.map((category) => `"${category}"`),
      );
    }

    const options = new Map<string, readonly string[]>();
    for (const [category, values] of Object.entries(parsed.data)) {
      options.set(category, Object.freeze([...values]));
    }
    return new OptionCatalog(options, Object.freeze(data.bom.map((entry) => Object.freeze({ ...entry }))));
  }

  optionsFor(category: string): readonly string[] {
    const values = this.options.get(category);
    if (!values) {
      throw new CategoryNotFoundError(category);
    }
    return values;
  }

  categories(): string[] {
    return [...this.options.keys()];
  }

  /**
   * First BOM row whose model/spec text mentions `model`, ignoring case.
   */
  findBomEntry(model: string): BomEntry | undefined {
    const needle = model.trim().toLowerCase();
    if (needle.length === 0) return undefined;
    return this.bom.find((entry) => entry.modelSpec.toLowerCase().includes(needle));
  }
}
