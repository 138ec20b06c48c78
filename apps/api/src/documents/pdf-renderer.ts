import { jsPDF } from 'jspdf';
import autoTable, { UserOptions } from 'jspdf-autotable';

import { formatAmount } from '../common/format';
import type { DraftView } from './draft-view';

export interface Branding {
  companyName: string;
  logo?: Buffer; // PNG
}

export interface PdfInput {
  view: DraftView;
  branding: Branding;
  createdAt: Date;
  fileId: string; // 32 hex digits
}

const MARGIN = 40;
const SECTION_GAP = 16;
const LOGO_WIDTH = 140;
const LOGO_HEIGHT = 52;
const HEAD_FILL: [number, number, number] = [245, 245, 245];
const ACCENT = '#ff8800';

type TableContent = Pick<UserOptions, 'head' | 'body' | 'foot' | 'columnStyles'>;

/** Draws one table below `startY` and returns where the next one may start. */
function drawTable(doc: jsPDF, startY: number, content: TableContent): number {
  let endY = startY;
  autoTable(doc, {
    ...content,
    startY,
    theme: 'grid',
    margin: { left: MARGIN, right: MARGIN },
    styles: { fontSize: 9, cellPadding: 4, lineColor: 200, lineWidth: 0.5 },
    headStyles: { fillColor: HEAD_FILL, textColor: 20, fontStyle: 'bold' },
    footStyles: { fillColor: HEAD_FILL, textColor: 20, fontStyle: 'bold' },
    didDrawPage: (data) => {
      endY = data.cursor?.y ?? endY;
    },
  });
  return endY + SECTION_GAP;
}

export function renderPdf({ view, branding, createdAt, fileId }: PdfInput): Buffer {
  const doc = new jsPDF({ unit: 'pt', format: 'a4' });
  doc.setCreationDate(createdAt);
  doc.setFileId(fileId);
  doc.setProperties({
    title: `RFQ ${view.reference}`,
    subject: `Request for quotation from ${view.customerName}`,
    creator: branding.companyName,
  });

  let y = MARGIN;
  if (branding.logo) {
    doc.addImage(branding.logo, 'PNG', MARGIN, y, LOGO_WIDTH, LOGO_HEIGHT);
    y += LOGO_HEIGHT + SECTION_GAP;
  }

  doc.setFont('helvetica', 'bold');
  doc.setFontSize(18);
  doc.setTextColor(ACCENT);
  doc.text('RFQ Summary', MARGIN, y + 12);
  doc.setFont('helvetica', 'normal');
  doc.setFontSize(10);
  doc.setTextColor('#3c3c3c');
  doc.text(`${branding.companyName} | ${view.reference} | ${view.customerName}`, MARGIN, y + 30);
  y += 30 + SECTION_GAP;

  for (const section of view.sections) {
    y = drawTable(doc, y, {
      head: [[section.label, '']],
      body: section.rows,
      columnStyles: { 0: { cellWidth: 170, fontStyle: 'bold' } },
    });
  }

  if (view.items.length > 0) {
    drawTable(doc, y, {
      head: [['S.no', 'Model / Spec', 'Head', 'Qty', 'Unit Cost', 'Line Cost']],
      body: view.items.map((item) => [
        String(item.sNo),
        item.model,
        item.head || '-',
        String(item.qty),
        formatAmount(item.unitCost),
        formatAmount(item.lineCost),
      ]),
      foot: [['', '', '', '', 'Total', formatAmount(view.total)]],
      columnStyles: {
        0: { cellWidth: 36 },
        3: { halign: 'right' },
        4: { halign: 'right' },
        5: { halign: 'right' },
      },
    });
  }

  return Buffer.from(doc.output('arraybuffer'));
}
