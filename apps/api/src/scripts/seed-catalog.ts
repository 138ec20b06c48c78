import * as fs from 'fs';
import * as path from 'path';
import { Workbook } from 'exceljs';
import { z } from 'zod';

// Writes a sample option workbook for local development.
// Usage: npm run seed:catalog [-- <output.xlsx>]

const SampleSchema = z.object({
  options: z.record(z.array(z.string())),
  bom: z.object({
    title: z.string(),
    header: z.array(z.string()),
    rows: z.array(z.tuple([z.string(), z.string(), z.string(), z.number(), z.number()])),
  }),
});

async function main() {
  const source = path.resolve(__dirname, '../../data/sample-catalog.json');
  const target = path.resolve(process.argv[2] ?? process.env.RFQ_CATALOG_PATH ?? 'data/rfq-catalog.xlsx');
  const sample = SampleSchema.parse(JSON.parse(fs.readFileSync(source, 'utf8')));

  const workbook = new Workbook();
  const options = workbook.addWorksheet('Options');
  const categories = Object.keys(sample.options);
  options.addRow(categories);
  const depth = Math.max(...categories.map((category) => sample.options[category].length));
  for (let i = 0; i < depth; i++) {
    options.addRow(categories.map((category) => sample.options[category][i] ?? null));
  }

  const bom = workbook.addWorksheet(process.env.RFQ_CATALOG_BOM_SHEET ?? 'BOM');
  bom.addRow([sample.bom.title]);
  bom.addRow([]);
  bom.addRow(sample.bom.header);
  sample.bom.rows.forEach((row, index) => bom.addRow([index + 1, ...row]));

  fs.mkdirSync(path.dirname(target), { recursive: true });
  await workbook.xlsx.writeFile(target);
  // eslint-disable-next-line no-console
  console.log(`Wrote ${categories.length} option categories and ${sample.bom.rows.length} BOM rows to ${target}`);
}

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
