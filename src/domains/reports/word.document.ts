// ──────────────────────────────────────────
// Reports: Word (.docx) rendering
// ──────────────────────────────────────────

import {
  AlignmentType,
  Document,
  HeadingLevel,
  ImageRun,
  Packer,
  PageBreak,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import type { ReportImage, ReportLayout, ReportTable } from './layout';

const HEADER_FILL = '2C3E50';
const LABEL_FILL = 'ECF0F1';

// Printable width of a portrait page with default margins, in pixels at 96 dpi
const CONTENT_WIDTH_PX = 600;

export async function renderWord(layout: ReportLayout, images: ReportImage[]): Promise<Buffer> {
  const doc = new Document({
    title: layout.title,
    sections: [
      {
        children: [
          new Paragraph({ text: layout.title, heading: HeadingLevel.TITLE, alignment: AlignmentType.CENTER }),
          new Paragraph({
            alignment: AlignmentType.CENTER,
            children: [new TextRun({ text: layout.subtitle, italics: true, size: 18 })],
          }),

          heading('Dataset Overview'),
          new Table({
            width: { size: 100, type: WidthType.PERCENTAGE },
            rows: layout.overview.map(
              (item) => new TableRow({ children: [cell(item.label, { bold: true, fill: LABEL_FILL }), cell(item.value)] })
            ),
          }),

          heading('Highlights'),
          ...layout.highlights.map((line) => new Paragraph({ text: line, bullet: { level: 0 } })),

          heading('Platform Performance'),
          table(layout.platformTable),

          heading('Category Performance'),
          table(layout.categoryTable),

          ...images.flatMap((image) => chart(image)),
        ],
      },
    ],
  });

  return Packer.toBuffer(doc);
}

function heading(text: string): Paragraph {
  return new Paragraph({ text, heading: HeadingLevel.HEADING_1, spacing: { before: 240, after: 120 } });
}

function table(data: ReportTable): Table {
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [
      new TableRow({
        tableHeader: true,
        children: data.columns.map((column) => cell(column, { bold: true, fill: HEADER_FILL, color: 'FFFFFF' })),
      }),
      ...data.rows.map((row) => new TableRow({ children: row.map((value) => cell(value)) })),
    ],
  });
}

function cell(text: string, style: { bold?: boolean; fill?: string; color?: string } = {}): TableCell {
  return new TableCell({
    shading: style.fill ? { type: ShadingType.CLEAR, color: 'auto', fill: style.fill } : undefined,
    children: [new Paragraph({ children: [new TextRun({ text, bold: style.bold, color: style.color })] })],
  });
}

function chart(image: ReportImage): Paragraph[] {
  const width = Math.min(CONTENT_WIDTH_PX, image.width);
  return [
    new Paragraph({ children: [new PageBreak()] }),
    heading(image.title),
    new Paragraph({
      alignment: AlignmentType.CENTER,
      children: [
        new ImageRun({
          type: 'png',
          data: image.png,
          transformation: { width, height: Math.round((image.height * width) / image.width) },
        }),
      ],
    }),
  ];
}
