import {
  REPORT_TITLE,
  buildReportContent,
  formatAssessmentDate,
  generateAssessmentPdf,
  renderReportPdf,
  reportFileName,
} from '../src/services/report-service';
import { MISSING_START_SENTINEL } from '../src/services/assessment-store';
import { dimensionTotals } from '../src/services/scoring-service';
import type { StoredAssessment } from '../src/types/assessment';
import { sampleRecord, silenceConsole, testCatalog } from './helpers';

describe('report service', () => {
  const catalog = testCatalog();

  const stored = (overrides: Partial<StoredAssessment> = {}): StoredAssessment => {
    const record = sampleRecord(catalog);
    return {
      ...record,
      id: 'assessment_jane-example-com_20261019_143000_abcdef12',
      dimension_scores: dimensionTotals(catalog, record.scores),
      ...overrides,
    };
  };

  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('formatAssessmentDate', () => {
    it('should spell out the date and 12-hour time', () => {
      expect(formatAssessmentDate('2026-10-19T14:30:00.000Z', 'UTC')).toBe('October 19, 2026 at 02:30 PM');
    });

    it('should render in the configured time zone', () => {
      expect(formatAssessmentDate('2026-10-19T14:30:00.000Z', 'America/New_York')).toBe(
        'October 19, 2026 at 10:30 AM'
      );
    });

    it('should not invent a date for records without a start time', () => {
      expect(formatAssessmentDate(MISSING_START_SENTINEL, 'UTC')).toBe('Not recorded');
    });
  });

  describe('reportFileName', () => {
    it.each([
      ['Jane Doe', 'Jane Doe_assessment.pdf'],
      ['Zoë O\'Brien', 'Zo OBrien_assessment.pdf'],
      ['../../etc', 'etc_assessment.pdf'],
      ['***', 'Unknown_assessment.pdf'],
    ])('should turn %p into %p', (name, expected) => {
      expect(reportFileName(name)).toBe(expected);
    });
  });

  describe('buildReportContent', () => {
    it('should list the coachee details before the dimension analysis', () => {
      const lines = buildReportContent(catalog, stored(), 'UTC');

      expect(lines.slice(0, 7)).toEqual([
        { kind: 'title', text: REPORT_TITLE },
        { kind: 'heading', text: 'Coachee Information' },
        { kind: 'field', text: 'Name: Jane Doe' },
        { kind: 'field', text: 'Email: jane@example.com' },
        { kind: 'field', text: 'Phone: 555-0100' },
        { kind: 'field', text: 'Assessment Date: October 19, 2026 at 02:10 PM' },
        { kind: 'heading', text: 'Leadership Dimensions Analysis' },
      ]);
    });

    it('should write a score, analysis and development focus per dimension in catalog order', () => {
      const lines = buildReportContent(catalog, stored(), 'UTC');
      const [first, second] = catalog.allDimensions();

      expect(lines).toHaveLength(7 + 8 * 3);
      expect(lines[7]).toEqual({ kind: 'subheading', text: `${first.title}: 60/60` });
      expect(lines[8]).toEqual({
        kind: 'paragraph',
        text: `Analysis: ${catalog.textFor(first.id, 'high').interpretation}`,
      });
      expect(lines[9]).toEqual({
        kind: 'paragraph',
        text: `Development Focus: ${catalog.textFor(first.id, 'high').development}`,
      });
      expect(lines[10]).toEqual({ kind: 'subheading', text: `${second.title}: 6/60` });
      expect(lines[11].text).toBe(`Analysis: ${catalog.textFor(second.id, 'low').interpretation}`);
    });

    it('should mark a missing phone number and a missing start time', () => {
      const lines = buildReportContent(
        catalog,
        stored({ coachee_phone: '', assessment_start: MISSING_START_SENTINEL }),
        'UTC'
      );

      expect(lines[4].text).toBe('Phone: Not provided');
      expect(lines[5].text).toBe('Assessment Date: Not recorded');
    });
  });

  describe('PDF output', () => {
    it('should render a PDF document', () => {
      const buffer = renderReportPdf(buildReportContent(catalog, stored(), 'UTC'));

      expect(buffer.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should spill long reports onto further pages', () => {
      const long = 'A long paragraph that keeps going. '.repeat(40);
      const lines = Array.from({ length: 12 }, () => ({ kind: 'paragraph' as const, text: long }));

      const pdf = renderReportPdf(lines).toString('latin1');

      expect((pdf.match(/\/Type \/Page\b/g) ?? []).length).toBeGreaterThan(1);
    });

    it('should name the download after the coachee', () => {
      const { buffer, filename } = generateAssessmentPdf(catalog, stored(), 'UTC');

      expect(filename).toBe('Jane Doe_assessment.pdf');
      expect(buffer.length).toBeGreaterThan(0);
    });
  });
});
