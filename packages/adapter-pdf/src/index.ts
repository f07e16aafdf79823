import PDFDocument from "pdfkit";
import type { RenderableReport, RenderOptions, RenderPort, ReportRow } from "@wlr/core";
import { labelsFor, type ReportLabels } from "./labels.js";

export { LABELS, labelsFor, type ReportLabels } from "./labels.js";

export interface PdfRendererOptions {
  bandTitle?: string;          // overrides the localized band title
  date?: () => Date;           // default: now
  labels?: Partial<ReportLabels>;
}

const CM = 72 / 2.54;
const MARGIN = 2 * CM;
const TOP_MARGIN = 4.5 * CM; // room for the page band
const BAND = { top: 1 * CM, height: 2 * CM, widths: [5 * CM, 9 * CM, 5 * CM] } as const;
const COLUMNS = [7 * CM, 7 * CM, 2.5 * CM] as const;
const CELL_PAD = 4;
const TABLE_FONT_SIZE = 9;

type Doc = PDFKit.PDFDocument;

export function makePdfRenderer(opts: PdfRendererOptions = {}): RenderPort {
  const now = opts.date ?? (() => new Date());

  return {
    render(reports: RenderableReport[], renderOpts: RenderOptions = {}): Promise<Buffer> {
      const labels: ReportLabels = { ...labelsFor(renderOpts.language), ...opts.labels };
      const bandTitle = opts.bandTitle ?? labels.bandTitle;

      return new Promise<Buffer>((resolve, reject) => {
        const doc = new PDFDocument({
          size: "A4",
          margins: { top: TOP_MARGIN, bottom: MARGIN, left: MARGIN, right: MARGIN },
          bufferPages: true,
          info: { Title: labels.documentTitle },
        });
        const chunks: Buffer[] = [];
        doc.on("data", (chunk: Buffer) => chunks.push(chunk));
        doc.on("end", () => resolve(Buffer.concat(chunks)));
        doc.on("error", reject);

        try {
          drawBody(doc, reports, labels);
          drawBands(doc, bandTitle, formatDate(now()));
          doc.end();
        } catch (err) {
          reject(err);
        }
      });
    },
  };
}

export function formatDate(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}/${pad(d.getMonth() + 1)}/${pad(d.getDate())}`;
}

function drawBody(doc: Doc, reports: RenderableReport[], labels: ReportLabels): void {
  doc.font("Helvetica-Bold").fontSize(18).text(labels.documentTitle, { align: "center" });
  doc.moveDown(1.5);

  for (const report of reports) {
    doc.font("Helvetica").fontSize(13).text(`${labels.file}: `, { continued: true });
    doc.font("Helvetica-Bold").text(report.filename);
    doc.moveDown(0.4);

    if (report.rows.length === 0) {
      doc.font("Helvetica").fontSize(10).text(labels.noErrors);
      doc.moveDown(1);
      continue;
    }

    drawTable(doc, report.rows, labels);
    doc.moveDown(2);
  }
}

function drawTable(doc: Doc, rows: ReportRow[], labels: ReportLabels): void {
  const header = [...labels.columns];
  drawRow(doc, header, true);
  for (const row of rows) {
    const cells = [row.message, row.solution, String(row.occurrences)];
    if (doc.y + rowHeight(doc, cells, false) > doc.page.height - doc.page.margins.bottom) {
      doc.addPage();
      drawRow(doc, header, true); // repeat the header on each page
    }
    drawRow(doc, cells, false);
  }
  doc.x = doc.page.margins.left;
}

function rowHeight(doc: Doc, cells: string[], isHeader: boolean): number {
  doc.font(isHeader ? "Helvetica-Bold" : "Helvetica").fontSize(TABLE_FONT_SIZE);
  const heights = cells.map((c, i) => doc.heightOfString(c, { width: (COLUMNS[i] ?? 0) - 2 * CELL_PAD }));
  return Math.max(...heights) + 2 * CELL_PAD;
}

function drawRow(doc: Doc, cells: string[], isHeader: boolean): void {
  const height = rowHeight(doc, cells, isHeader);
  const top = doc.y;
  let x = doc.page.margins.left;

  cells.forEach((cell, i) => {
    const width = COLUMNS[i] ?? 0;
    doc.lineWidth(0.25);
    if (isHeader) doc.rect(x, top, width, height).fillAndStroke("#add8e6", "#808080");
    else doc.rect(x, top, width, height).stroke("#808080");
    doc.fillColor("black").text(cell, x + CELL_PAD, top + CELL_PAD, { width: width - 2 * CELL_PAD });
    x += width;
  });

  doc.x = doc.page.margins.left;
  doc.y = top + height;
}

/** Date | title | blank band at the top of every buffered page. */
function drawBands(doc: Doc, title: string, date: string): void {
  const { start, count } = doc.bufferedPageRange();
  for (let i = start; i < start + count; i++) {
    doc.switchToPage(i);
    const totalWidth = BAND.widths.reduce((a, b) => a + b, 0);
    let x = (doc.page.width - totalWidth) / 2;
    const cells = [date, title, ""];

    doc.lineWidth(0.5).strokeColor("black");
    doc.font("Helvetica-Bold").fontSize(11).fillColor("black");
    BAND.widths.forEach((width, col) => {
      doc.rect(x, BAND.top, width, BAND.height).stroke();
      const text = cells[col] ?? "";
      if (text) {
        const textHeight = doc.heightOfString(text, { width: width - 2 * CELL_PAD });
        doc.text(text, x + CELL_PAD, BAND.top + (BAND.height - textHeight) / 2, {
          width: width - 2 * CELL_PAD,
          align: "center",
          lineBreak: true,
        });
      }
      x += width;
    });
  }
}
