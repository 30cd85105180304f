// backend/src/services/report-service.ts
import { jsPDF } from 'jspdf';
import { MISSING_START_SENTINEL } from './assessment-store';
import { evaluate } from './scoring-service';
import type { CompetencyCatalog } from './catalog-service';
import type { StoredAssessment } from '../types/assessment';

export const REPORT_TITLE = 'Leadership Assessment Report';

export type ReportLineKind = 'title' | 'heading' | 'subheading' | 'field' | 'paragraph';

export interface ReportLine {
  kind: ReportLineKind;
  text: string;
}

// Font size (pt), weight and the gap (mm) left after the block.
const LINE_STYLES: Record<ReportLineKind, { size: number; bold: boolean; after: number }> = {
  title: { size: 16, bold: true, after: 6 },
  heading: { size: 14, bold: true, after: 3 },
  subheading: { size: 12, bold: true, after: 1 },
  field: { size: 11, bold: false, after: 1 },
  paragraph: { size: 10, bold: false, after: 3 },
};

const MARGIN = 20;
const PT_TO_MM = 0.3528;

/** "October 19, 2026 at 02:30 PM" in the given IANA time zone. */
export const formatAssessmentDate = (iso: string, timeZone: string): string => {
  if (iso === MISSING_START_SENTINEL) return 'Not recorded';
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;

  const day = date.toLocaleDateString('en-US', { month: 'long', day: 'numeric', year: 'numeric', timeZone });
  // ICU puts a narrow no-break space before AM/PM, which the standard PDF fonts cannot draw.
  const time = date
    .toLocaleTimeString('en-US', { hour: '2-digit', minute: '2-digit', timeZone })
    .replace(/\s/g, ' ');
  return `${day} at ${time}`;
};

export const reportFileName = (respondentName: string): string => {
  const safeName = respondentName.replace(/[^a-zA-Z0-9 \-_]/g, '').trim() || 'Unknown';
  return `${safeName}_assessment.pdf`;
};

/**
 * The report as an ordered list of styled lines. Kept separate from the PDF
 * drawing so the content can be checked without reading PDF output.
 */
export const buildReportContent = (
  catalog: CompetencyCatalog,
  assessment: StoredAssessment,
  timeZone: string
): ReportLine[] => {
  const { results } = evaluate(catalog, assessment.scores);

  const lines: ReportLine[] = [
    { kind: 'title', text: REPORT_TITLE },
    { kind: 'heading', text: 'Coachee Information' },
    { kind: 'field', text: `Name: ${assessment.coachee_name}` },
    { kind: 'field', text: `Email: ${assessment.coachee_email}` },
    { kind: 'field', text: `Phone: ${assessment.coachee_phone || 'Not provided'}` },
    { kind: 'field', text: `Assessment Date: ${formatAssessmentDate(assessment.assessment_start, timeZone)}` },
    { kind: 'heading', text: 'Leadership Dimensions Analysis' },
  ];

  for (const result of results) {
    lines.push(
      { kind: 'subheading', text: `${result.title}: ${result.total}/${result.maxTotal}` },
      { kind: 'paragraph', text: `Analysis: ${result.interpretation}` },
      { kind: 'paragraph', text: `Development Focus: ${result.development}` }
    );
  }

  return lines;
};

export const renderReportPdf = (lines: ReportLine[]): Buffer => {
  const doc = new jsPDF({ unit: 'mm', format: 'a4' });
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  const maxWidth = pageWidth - 2 * MARGIN;
  let currentY = MARGIN;

  for (const line of lines) {
    const style = LINE_STYLES[line.kind];
    const lineHeight = style.size * PT_TO_MM * 1.4;

    doc.setFont('helvetica', style.bold ? 'bold' : 'normal');
    doc.setFontSize(style.size);
    const wrapped: string[] = doc.splitTextToSize(line.text, maxWidth);

    for (const text of wrapped) {
      if (currentY + lineHeight > pageHeight - MARGIN) {
        doc.addPage();
        currentY = MARGIN;
      }
      doc.text(text, MARGIN, currentY);
      currentY += lineHeight;
    }
    currentY += style.after;
  }

  return Buffer.from(doc.output('arraybuffer'));
};

export const generateAssessmentPdf = (
  catalog: CompetencyCatalog,
  assessment: StoredAssessment,
  timeZone: string
): { buffer: Buffer; filename: string } => {
  const buffer = renderReportPdf(buildReportContent(catalog, assessment, timeZone));
  console.log(`[Report] Generated PDF for ${assessment.id} (${buffer.length} bytes)`);
  return { buffer, filename: reportFileName(assessment.coachee_name) };
};
