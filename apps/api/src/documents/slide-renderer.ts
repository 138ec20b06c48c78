import PptxGenJS from 'pptxgenjs';

import { formatAmount } from '../common/format';
import { normaliseArchive } from './archive';
import type { DraftView } from './draft-view';
import type { Branding } from './pdf-renderer';

export interface SlidesInput {
  view: DraftView;
  branding: Branding;
  createdAt: Date;
}

const HEADING: PptxGenJS.TextPropsOptions = { x: 0.5, y: 0.3, w: 9, h: 0.6, fontSize: 24, bold: true, color: 'FF8800' };
const TABLE_BORDER: PptxGenJS.BorderProps = { type: 'solid', pt: 0.5, color: 'C8C8C8' };
const HEADER_CELL: PptxGenJS.TableCellProps = { bold: true, fill: { color: 'F5F5F5' } };

function cell(text: string, options?: PptxGenJS.TableCellProps): PptxGenJS.TableCell {
  return options ? { text, options } : { text };
}

function itemRows(view: DraftView): PptxGenJS.TableRow[] {
  const right: PptxGenJS.TableCellProps = { align: 'right' };
  return [
    ['S.no', 'Model / Spec', 'Head', 'Qty', 'Unit Cost', 'Line Cost'].map((text) => cell(text, HEADER_CELL)),
    ...view.items.map((item) => [
      cell(String(item.sNo)),
      cell(item.model),
      cell(item.head || '-'),
      cell(String(item.qty), right),
      cell(formatAmount(item.unitCost), right),
      cell(formatAmount(item.lineCost), right),
    ]),
    [cell(''), cell(''), cell(''), cell(''), cell('Total', HEADER_CELL), cell(formatAmount(view.total), { ...HEADER_CELL, align: 'right' })],
  ];
}

/** A title slide, one slide per step, and the bill of quantity when it has lines. */
export async function renderSlides({ view, branding, createdAt }: SlidesInput): Promise<Buffer> {
  const pres = new PptxGenJS();
  pres.layout = 'LAYOUT_16x9';
  pres.company = branding.companyName;
  pres.author = branding.companyName;
  pres.title = `RFQ ${view.reference}`;
  pres.subject = `Request for quotation from ${view.customerName}`;

  const cover = pres.addSlide();
  if (branding.logo) {
    cover.addImage({ data: `image/png;base64,${branding.logo.toString('base64')}`, x: 0.5, y: 0.4, w: 2, h: 0.75 });
  }
  cover.addText('RFQ Summary', { x: 0.5, y: 1.8, w: 9, h: 0.9, fontSize: 36, bold: true, color: 'FF8800' });
  cover.addText(view.customerName, { x: 0.5, y: 2.8, w: 9, h: 0.6, fontSize: 20, color: '333333' });
  cover.addText(`${branding.companyName} | ${view.reference}`, { x: 0.5, y: 3.5, w: 9, h: 0.4, fontSize: 14, color: '666666' });

  for (const section of view.sections) {
    const slide = pres.addSlide();
    slide.addText(section.label, HEADING);
    slide.addTable(
      section.rows.map(([label, value]) => [cell(label, HEADER_CELL), cell(value)]),
      { x: 0.5, y: 1.1, w: 9, colW: [3, 6], fontSize: 10, border: TABLE_BORDER },
    );
  }

  if (view.items.length > 0) {
    const slide = pres.addSlide();
    slide.addText(view.itemsLabel, HEADING);
    slide.addTable(itemRows(view), {
      x: 0.5,
      y: 1.1,
      w: 9,
      fontSize: 10,
      border: TABLE_BORDER,
    });
  }

  const output = await pres.write({ outputType: 'nodebuffer' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Slide deck did not render to a buffer');
  }
  return normaliseArchive(output, createdAt);
}
