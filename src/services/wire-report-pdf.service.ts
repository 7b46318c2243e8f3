import PDFDocument from 'pdfkit';
import { Writable } from 'stream';
import { LineSegment } from '../models/line-segment.model';
import { Point, WireColor } from '../models/wire.types';
import { PageAnalysis } from './wire-detection.service';

/** Ink used for each wire color in the overlay */
export const OVERLAY_COLORS: Readonly<Record<WireColor, string>> = {
  red: '#d62728',
  blue: '#1f5fd6',
  green: '#2ca02c',
  yellow_green: '#9acd32',
  black: '#000000',
  brown: '#8c564b',
  white: '#b0b0b0',
  orange: '#ff7f0e',
  gray: '#7f7f7f',
  other: '#9467bd'
};

const NON_WIRE_INK = '#dddddd';
const JUNCTION_RADIUS = 2.5;

export interface ReportOptions {
  /** Draw non-wire lines in light grey behind the wires */
  showOtherLines?: boolean;
  /** Label each path with its voltage */
  labelPaths?: boolean;
}

/**
 * Renders traced wires back onto blank pages of the original size, one PDF
 * page per analysed page.
 */
export class WireReportPdfService {
  generateReport(pages: PageAnalysis[], outputStream: Writable, options: ReportOptions = {}): Promise<void> {
    const { showOtherLines = true, labelPaths = true } = options;

    return new Promise((resolve, reject) => {
      const doc = new PDFDocument({ autoFirstPage: false, margin: 0 });

      doc.pipe(outputStream);
      doc.on('end', () => resolve());
      doc.on('error', reject);

      try {
        if (pages.length === 0) {
          doc.addPage({ size: 'A4', margin: 0 });
          doc.fontSize(10).fillColor('#000000').text('No pages analysed', 40, 40);
        }

        for (const page of pages) {
          const width = page.pageSize.width > 0 ? page.pageSize.width : 595;
          const height = page.pageSize.height > 0 ? page.pageSize.height : 842;
          doc.addPage({ size: [width, height], margin: 0 });

          if (showOtherLines) {
            for (const [type, segments] of Object.entries(page.lines)) {
              if (type === 'wire') continue;
              this.strokeSegments(doc, segments, NON_WIRE_INK, 0.5);
            }
          }

          for (const path of page.paths) {
            const ink = OVERLAY_COLORS[path.color];
            this.strokeSegments(doc, path.segments, ink, 1.5);

            if (labelPaths) {
              const anchor = path.points[0];
              doc.fontSize(5).fillColor(ink).text(path.voltageType, anchor.x + 2, anchor.y + 2, { lineBreak: false });
            }
          }

          for (const junction of page.junctions) {
            this.drawJunction(doc, junction);
          }
        }

        doc.end();
      } catch (error) {
        reject(error);
      }
    });
  }

  private strokeSegments(doc: PDFKit.PDFDocument, segments: readonly LineSegment[], ink: string, lineWidth: number) {
    if (segments.length === 0) return;

    doc.save();
    doc.strokeColor(ink).lineWidth(lineWidth);
    for (const segment of segments) {
      doc.moveTo(segment.start.x, segment.start.y).lineTo(segment.end.x, segment.end.y);
    }
    doc.stroke();
    doc.restore();
  }

  private drawJunction(doc: PDFKit.PDFDocument, point: Point) {
    doc.save();
    doc.circle(point.x, point.y, JUNCTION_RADIUS).fill('#000000');
    doc.restore();
  }
}
