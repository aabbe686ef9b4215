/**
 * PDF report rendering with @react-pdf/renderer.
 *
 * Page one carries the summary tables; every chart follows on its own page,
 * scaled to the printable width.
 */

import React from 'react';
import { Document, Image, Page, StyleSheet, Text, View, renderToBuffer } from '@react-pdf/renderer';
import type { ReportImage, ReportLayout, ReportTable } from './layout';

const PRIMARY = '#2c3e50';
const GREY_BG = '#ecf0f1';
const BORDER = '#bdc3c7';

// A4 is 595pt wide; padding leaves this much for content
const CONTENT_WIDTH = 515;

const styles = StyleSheet.create({
  page: {
    padding: 40,
    fontSize: 10,
    fontFamily: 'Helvetica',
    color: PRIMARY,
  },
  title: {
    fontSize: 22,
    fontFamily: 'Helvetica-Bold',
    textAlign: 'center',
    marginBottom: 6,
  },
  subtitle: {
    fontSize: 9,
    textAlign: 'center',
    marginBottom: 18,
  },
  heading: {
    fontSize: 14,
    fontFamily: 'Helvetica-Bold',
    marginTop: 14,
    marginBottom: 8,
  },
  table: {
    borderTopWidth: 1,
    borderLeftWidth: 1,
    borderColor: BORDER,
  },
  tableRow: {
    flexDirection: 'row',
  },
  headerRow: {
    flexDirection: 'row',
    backgroundColor: PRIMARY,
    color: '#ffffff',
  },
  cell: {
    flex: 1,
    paddingVertical: 4,
    paddingHorizontal: 6,
    borderRightWidth: 1,
    borderBottomWidth: 1,
    borderColor: BORDER,
  },
  headerCell: {
    fontFamily: 'Helvetica-Bold',
  },
  labelCell: {
    backgroundColor: GREY_BG,
    fontFamily: 'Helvetica-Bold',
  },
  bullet: {
    marginBottom: 3,
  },
  chartTitle: {
    fontSize: 13,
    fontFamily: 'Helvetica-Bold',
    marginBottom: 10,
  },
});

const Table: React.FC<{ table: ReportTable }> = ({ table }) => (
  <View style={styles.table}>
    <View style={styles.headerRow}>
      {table.columns.map((column) => (
        <Text key={column} style={[styles.cell, styles.headerCell]}>
          {column}
        </Text>
      ))}
    </View>
    {table.rows.map((row) => (
      <View key={row[0]} style={styles.tableRow} wrap={false}>
        {row.map((value, i) => (
          <Text key={table.columns[i]} style={styles.cell}>
            {value}
          </Text>
        ))}
      </View>
    ))}
  </View>
);

interface ReportPdfProps {
  layout: ReportLayout;
  images: ReportImage[];
}

const ReportPdf: React.FC<ReportPdfProps> = ({ layout, images }) => (
  <Document title={layout.title}>
    <Page size="A4" style={styles.page}>
      <Text style={styles.title}>{layout.title}</Text>
      <Text style={styles.subtitle}>{layout.subtitle}</Text>

      <Text style={styles.heading}>Dataset Overview</Text>
      <View style={styles.table}>
        {layout.overview.map((item) => (
          <View key={item.label} style={styles.tableRow}>
            <Text style={[styles.cell, styles.labelCell]}>{item.label}</Text>
            <Text style={styles.cell}>{item.value}</Text>
          </View>
        ))}
      </View>

      <Text style={styles.heading}>Highlights</Text>
      {layout.highlights.map((line) => (
        <Text key={line} style={styles.bullet}>
          • {line}
        </Text>
      ))}

      <Text style={styles.heading}>Platform Performance</Text>
      <Table table={layout.platformTable} />

      <Text style={styles.heading}>Category Performance</Text>
      <Table table={layout.categoryTable} />
    </Page>

    {images.map((image) => {
      const width = Math.min(CONTENT_WIDTH, image.width);
      return (
        <Page key={image.title} size="A4" style={styles.page}>
          <Text style={styles.chartTitle}>{image.title}</Text>
          <Image
            src={`data:image/png;base64,${image.png.toString('base64')}`}
            style={{ width, height: (image.height * width) / image.width }}
          />
        </Page>
      );
    })}
  </Document>
);

export async function renderPdf(layout: ReportLayout, images: ReportImage[]): Promise<Buffer> {
  const pdfBuffer = await renderToBuffer(<ReportPdf layout={layout} images={images} />);
  return Buffer.from(pdfBuffer);
}
