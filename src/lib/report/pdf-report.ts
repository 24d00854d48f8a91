import {
  PDFDocument,
  PDFFont,
  PDFPage,
  StandardFonts,
  rgb,
  type RGB,
} from 'pdf-lib';
import { getImpactDescription } from '@/lib/analyzers/recommendations';
import { describeSignals } from '@/lib/signal-rows';
import {
  ProgressSummary,
  QuickWinIssue,
  Recommendation,
  SUBSCORE_MAXIMUMS,
  ScanOutcome,
  getGrade,
} from '@/lib/types';

const PAGE_WIDTH = 595.28; // A4
const PAGE_HEIGHT = 841.89;
const PAGE_MARGIN_X = 46;
const PAGE_MARGIN_TOP = 44;
const PAGE_MARGIN_BOTTOM = 46;
const CONTENT_WIDTH = PAGE_WIDTH - PAGE_MARGIN_X * 2;
const PAGE_HEADER_HEIGHT = 26;

const COLOR_TEXT = rgb(0.11, 0.13, 0.18);
const COLOR_MUTED = rgb(0.39, 0.44, 0.52);
const COLOR_BORDER = rgb(0.87, 0.89, 0.93);
const COLOR_BRAND = rgb(0.15, 0.32, 0.68);
const COLOR_BRAND_SOFT = rgb(0.93, 0.95, 0.99);
const COLOR_GOOD = rgb(0.11, 0.57, 0.27);
const COLOR_WARN = rgb(0.69, 0.39, 0.06);
const COLOR_BAD = rgb(0.66, 0.16, 0.15);

const QUICK_WIN_LIMIT = 3;
const RECENT_IMPLEMENTATION_LIMIT = 5;

const PDF_CHAR_REPLACEMENTS: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '…': '...',
  '—': '-',
  '–': '-',
  '−': '-',
  '“': '"',
  '”': '"',
  '‘': "'",
  '’': "'",
  '✓': '[ok]',
  '✗': '[x]',
  '≤': '<=',
  '≥': '>=',
  '\u00A0': ' ',
};

export type ReportKind = 'quick-wins' | 'detailed' | 'progress';

export interface QuickWinsReportInput {
  url: string;
  liteScore: number;
  issues: QuickWinIssue[];
  generatedAt: Date;
}

export interface ProgressReportInput {
  url: string;
  summary: ProgressSummary;
  generatedAt: Date;
}

type FontKey = 'body' | 'bold' | 'mono';

type PdfFonts = Record<FontKey, PDFFont>;

type FontSupport = Record<FontKey, Set<number>>;

type ReportContext = {
  doc: PDFDocument;
  fonts: PdfFonts;
  support: FontSupport;
  page: PDFPage;
  y: number;
  title: string;
  domain: string;
};

type DrawTextOptions = {
  font?: FontKey;
  size?: number;
  color?: RGB;
  indent?: number;
  lineHeight?: number;
  after?: number;
  before?: number;
  maxWidth?: number;
};

function safeUrlHost(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme).hostname.toLowerCase();
  } catch {
    return 'site';
  }
}

function toDateStamp(value: Date | string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return 'unknown-date';
  return parsed.toISOString().slice(0, 10);
}

function toUtcDateTime(value: Date | string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return String(value);
  return `${parsed.toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}

export function buildReportFilename(kind: ReportKind, url: string, generatedAt: Date | string): string {
  const host = safeUrlHost(url).replace(/[^a-z0-9.-]/g, '-').replace(/-+/g, '-');
  return `signalscore-${kind}-${host}-${toDateStamp(generatedAt)}.pdf`;
}

async function embedFonts(doc: PDFDocument): Promise<PdfFonts> {
  return {
    body: await doc.embedFont(StandardFonts.Helvetica),
    bold: await doc.embedFont(StandardFonts.HelveticaBold),
    mono: await doc.embedFont(StandardFonts.Courier),
  };
}

function createFontSupport(fonts: PdfFonts): FontSupport {
  return {
    body: new Set(fonts.body.getCharacterSet()),
    bold: new Set(fonts.bold.getCharacterSet()),
    mono: new Set(fonts.mono.getCharacterSet()),
  };
}

// Standard fonts only encode WinAnsi; anything else becomes '?'.
function sanitizeForFont(text: string, support: Set<number>): string {
  let normalized = text.normalize('NFKD');

  for (const [search, replacement] of Object.entries(PDF_CHAR_REPLACEMENTS)) {
    normalized = normalized.split(search).join(replacement);
  }

  normalized = normalized.replace(/[\u0300-\u036f]/g, '');

  let result = '';
  for (const ch of normalized) {
    if (ch === '\n' || ch === '\r' || ch === '\t') {
      result += ch;
      continue;
    }

    const code = ch.codePointAt(0) || 0;
    if (support.has(code) || (code >= 0x20 && code <= 0x7e)) {
      result += ch;
    } else {
      result += '?';
    }
  }

  return result;
}

function drawPageHeader(ctx: ReportContext) {
  const headerY = PAGE_HEIGHT - PAGE_MARGIN_TOP;

  ctx.page.drawLine({
    start: { x: PAGE_MARGIN_X, y: headerY - 15 },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y: headerY - 15 },
    thickness: 0.7,
    color: COLOR_BORDER,
  });

  ctx.page.drawText(sanitizeForFont(ctx.title, ctx.support.bold), {
    x: PAGE_MARGIN_X,
    y: headerY - 6,
    font: ctx.fonts.bold,
    size: 10,
    color: COLOR_BRAND,
  });

  const right = sanitizeForFont(ctx.domain, ctx.support.body);
  const rightSize = 9;
  const rightWidth = ctx.fonts.body.widthOfTextAtSize(right, rightSize);
  ctx.page.drawText(right, {
    x: PAGE_WIDTH - PAGE_MARGIN_X - rightWidth,
    y: headerY - 6,
    font: ctx.fonts.body,
    size: rightSize,
    color: COLOR_MUTED,
  });
}

function createPage(ctx: ReportContext) {
  ctx.page = ctx.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  drawPageHeader(ctx);
  ctx.y = PAGE_HEIGHT - PAGE_MARGIN_TOP - PAGE_HEADER_HEIGHT;
}

function ensureSpace(ctx: ReportContext, neededHeight: number) {
  if (ctx.y - neededHeight >= PAGE_MARGIN_BOTTOM) return;
  createPage(ctx);
}

export function wrapLine(
  text: string,
  font: PDFFont,
  size: number,
  maxWidth: number,
): string[] {
  const normalized = text.replace(/\t/g, '  ').replace(/\s+/g, ' ').trim();
  if (!normalized) return [''];

  const words = normalized.split(' ');
  const lines: string[] = [];
  let current = words[0] || '';

  const fitWord = (word: string): string[] => {
    const parts: string[] = [];
    let segment = '';
    for (const ch of word) {
      const candidate = `${segment}${ch}`;
      if (segment && font.widthOfTextAtSize(candidate, size) > maxWidth) {
        parts.push(segment);
        segment = ch;
      } else {
        segment = candidate;
      }
    }
    if (segment) parts.push(segment);
    return parts;
  };

  for (let i = 1; i < words.length; i++) {
    const nextWord = words[i];
    const candidate = `${current} ${nextWord}`;

    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
      continue;
    }

    if (font.widthOfTextAtSize(nextWord, size) > maxWidth) {
      lines.push(current);
      const chunks = fitWord(nextWord);
      for (let c = 0; c < chunks.length - 1; c++) lines.push(chunks[c]);
      current = chunks[chunks.length - 1] || '';
      continue;
    }

    lines.push(current);
    current = nextWord;
  }

  lines.push(current);
  return lines;
}

function drawTextBlock(ctx: ReportContext, text: string, options: DrawTextOptions = {}) {
  const {
    font = 'body',
    size = 10.5,
    color = COLOR_TEXT,
    indent = 0,
    lineHeight = size + 3.5,
    after = 0,
    before = 0,
    maxWidth = CONTENT_WIDTH - indent,
  } = options;

  if (before > 0) {
    ensureSpace(ctx, before + 2);
    ctx.y -= before;
  }

  const pdfFont = ctx.fonts[font];
  const safe = sanitizeForFont(text, ctx.support[font]);

  for (const paragraph of safe.replace(/\r/g, '').split('\n')) {
    if (!paragraph.trim()) {
      ensureSpace(ctx, lineHeight * 0.6);
      ctx.y -= lineHeight * 0.6;
      continue;
    }

    for (const line of wrapLine(paragraph, pdfFont, size, maxWidth)) {
      ensureSpace(ctx, lineHeight + 2);
      ctx.page.drawText(line, {
        x: PAGE_MARGIN_X + indent,
        y: ctx.y,
        size,
        font: pdfFont,
        color,
      });
      ctx.y -= lineHeight;
    }
  }

  if (after > 0) {
    ensureSpace(ctx, after + 2);
    ctx.y -= after;
  }
}

function drawRule(ctx: ReportContext, after = 8) {
  ensureSpace(ctx, 8 + after);
  const y = ctx.y - 2;

  ctx.page.drawLine({
    start: { x: PAGE_MARGIN_X, y },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y },
    thickness: 0.7,
    color: COLOR_BORDER,
  });

  ctx.y = y - after;
}

function drawSectionHeading(ctx: ReportContext, title: string, subtitle?: string) {
  drawTextBlock(ctx, title, {
    font: 'bold',
    size: 16,
    color: COLOR_BRAND,
    lineHeight: 20,
    before: 8,
    after: 2,
  });

  if (subtitle) {
    drawTextBlock(ctx, subtitle, {
      size: 10,
      color: COLOR_MUTED,
      lineHeight: 14,
      after: 3,
    });
  }

  drawRule(ctx, 8);
}

function scoreColor(score: number, max: number): RGB {
  const ratio = max === 0 ? 0 : score / max;
  if (ratio >= 0.8) return COLOR_GOOD;
  if (ratio >= 0.5) return COLOR_WARN;
  return COLOR_BAD;
}

function drawMetricCard(
  ctx: ReportContext,
  x: number,
  y: number,
  title: string,
  value: string,
  caption: string,
  accent: RGB,
) {
  const width = 118;
  const height = 70;

  ctx.page.drawRectangle({
    x,
    y: y - height,
    width,
    height,
    color: COLOR_BRAND_SOFT,
    borderColor: COLOR_BORDER,
    borderWidth: 0.8,
  });

  ctx.page.drawText(sanitizeForFont(title, ctx.support.bold), {
    x: x + 10,
    y: y - 18,
    font: ctx.fonts.bold,
    size: 9.5,
    color: COLOR_MUTED,
  });

  ctx.page.drawText(sanitizeForFont(value, ctx.support.bold), {
    x: x + 10,
    y: y - 40,
    font: ctx.fonts.bold,
    size: 17,
    color: accent,
  });

  ctx.page.drawText(sanitizeForFont(caption, ctx.support.body), {
    x: x + 10,
    y: y - 57,
    font: ctx.fonts.body,
    size: 9.5,
    color: COLOR_TEXT,
  });
}

function drawCardRow(ctx: ReportContext, cards: Array<[string, string, string, RGB]>) {
  ensureSpace(ctx, 90);
  const rowY = ctx.y;
  cards.forEach(([title, value, caption, accent], index) => {
    drawMetricCard(ctx, PAGE_MARGIN_X + index * 126, rowY, title, value, caption, accent);
  });
  ctx.y -= 84;
}

function drawCover(ctx: ReportContext, heading: string, generatedAt: Date | string) {
  drawTextBlock(ctx, heading, {
    font: 'bold',
    size: 24,
    color: COLOR_BRAND,
    lineHeight: 30,
    after: 6,
  });

  drawTextBlock(ctx, ctx.domain, {
    font: 'bold',
    size: 15,
    color: COLOR_TEXT,
    lineHeight: 20,
  });

  drawTextBlock(ctx, `Generated ${toUtcDateTime(generatedAt)}`, {
    size: 10.5,
    color: COLOR_MUTED,
    lineHeight: 14,
    after: 8,
  });
}

function drawLabelRows(ctx: ReportContext, rows: Array<[string, string]>) {
  for (const [label, value] of rows) {
    drawTextBlock(ctx, `${label}:`, {
      font: 'bold',
      size: 10.5,
      lineHeight: 14,
      maxWidth: 130,
    });

    // Value goes on the label's baseline.
    ctx.y += 14;

    drawTextBlock(ctx, value, {
      size: 10.5,
      indent: 134,
      lineHeight: 14,
      maxWidth: CONTENT_WIDTH - 134,
      after: 1,
    });
  }
}

function drawIssue(ctx: ReportContext, issue: QuickWinIssue, index: number) {
  const accent = issue.priority === 1 ? COLOR_BAD : issue.priority === 2 ? COLOR_WARN : COLOR_BRAND;

  drawTextBlock(
    ctx,
    `${index + 1}. ${issue.fix} [priority ${issue.priority} | effort: ${issue.effort} | +${issue.pointsAvailable} pts]`,
    {
      font: 'bold',
      size: 11.5,
      color: accent,
      lineHeight: 15,
      before: 4,
    }
  );

  drawTextBlock(ctx, `Why: ${getImpactDescription(issue.type).why}`, {
    size: 10,
    lineHeight: 13.5,
    indent: 12,
  });

  drawTextBlock(ctx, 'Example:', {
    font: 'bold',
    size: 9.8,
    lineHeight: 13,
    indent: 12,
  });

  drawTextBlock(ctx, issue.example, {
    font: 'mono',
    size: 9,
    color: COLOR_TEXT,
    lineHeight: 12,
    indent: 24,
    after: 2,
  });
}

function drawIssues(ctx: ReportContext, issues: QuickWinIssue[], emptyMessage: string) {
  if (issues.length === 0) {
    drawTextBlock(ctx, emptyMessage, { color: COLOR_MUTED, after: 4 });
    return;
  }
  issues.forEach((issue, index) => drawIssue(ctx, issue, index));
}

function drawFooter(page: PDFPage, fonts: PdfFonts, support: FontSupport, pageNumber: number, totalPages: number) {
  const footerY = PAGE_MARGIN_BOTTOM - 20;

  page.drawLine({
    start: { x: PAGE_MARGIN_X, y: footerY + 12 },
    end: { x: PAGE_WIDTH - PAGE_MARGIN_X, y: footerY + 12 },
    thickness: 0.6,
    color: COLOR_BORDER,
  });

  page.drawText(sanitizeForFont('Generated by SignalScore', support.body), {
    x: PAGE_MARGIN_X,
    y: footerY,
    font: fonts.body,
    size: 8.5,
    color: COLOR_MUTED,
  });

  const right = sanitizeForFont(`Page ${pageNumber} of ${totalPages}`, support.body);
  const rightWidth = fonts.body.widthOfTextAtSize(right, 8.5);
  page.drawText(right, {
    x: PAGE_WIDTH - PAGE_MARGIN_X - rightWidth,
    y: footerY,
    font: fonts.body,
    size: 8.5,
    color: COLOR_MUTED,
  });
}

async function renderReport(
  url: string,
  title: string,
  subject: string,
  draw: (ctx: ReportContext) => void,
): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const fonts = await embedFonts(doc);
  const support = createFontSupport(fonts);
  const domain = safeUrlHost(url);

  doc.setTitle(`${title} - ${domain}`);
  doc.setAuthor('SignalScore');
  doc.setCreator('SignalScore');
  doc.setSubject(subject);
  doc.setKeywords(['signalscore', 'answer engine', 'report']);
  doc.setCreationDate(new Date());
  doc.setModificationDate(new Date());

  const ctx: ReportContext = {
    doc,
    fonts,
    support,
    page: doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]),
    y: 0,
    title,
    domain,
  };

  drawPageHeader(ctx);
  ctx.y = PAGE_HEIGHT - PAGE_MARGIN_TOP - PAGE_HEADER_HEIGHT;

  draw(ctx);

  const pages = doc.getPages();
  pages.forEach((page, index) => {
    drawFooter(page, fonts, support, index + 1, pages.length);
  });

  return doc.save();
}

export function generateQuickWinsReportPdf(input: QuickWinsReportInput): Promise<Uint8Array> {
  return renderReport(input.url, 'SignalScore Quick Wins Report', 'Free answer engine visibility check', ctx => {
    drawCover(ctx, 'Quick Wins Report', input.generatedAt);

    drawCardRow(ctx, [
      ['Lite Score', `${input.liteScore}/100`, `Grade ${getGrade(input.liteScore)}`, scoreColor(input.liteScore, 100)],
    ]);
    drawRule(ctx, 10);

    drawLabelRows(ctx, [['URL', input.url]]);

    drawSectionHeading(ctx, 'Top Quick Wins', 'The highest priority fixes for this page');
    drawIssues(ctx, input.issues.slice(0, QUICK_WIN_LIMIT), 'No quick wins found. This page covers the basics.');

    drawSectionHeading(ctx, 'Want the full picture?');
    drawTextBlock(
      ctx,
      'SignalScore Pro checks structured data, FAQ markup, headings, mobile readiness, accessibility and page speed, then tracks your progress over time.',
      { after: 4 },
    );
  });
}

export function generateDetailedReportPdf(outcome: ScanOutcome): Promise<Uint8Array> {
  const { facts, score } = outcome;
  return renderReport(facts.url, 'SignalScore Detailed Analysis', 'Answer engine visibility analysis', ctx => {
    drawCover(ctx, 'Detailed Analysis Report', outcome.scannedAt);

    drawCardRow(ctx, [
      ['Total', `${score.totalScore}/100`, `Grade ${outcome.grade}`, scoreColor(score.totalScore, 100)],
      ['Content', `${score.subscores.contentStructure}/${SUBSCORE_MAXIMUMS.contentStructure}`, 'Structure', scoreColor(score.subscores.contentStructure, SUBSCORE_MAXIMUMS.contentStructure)],
      ['Technical', `${score.subscores.technical}/${SUBSCORE_MAXIMUMS.technical}`, 'Speed + mobile', scoreColor(score.subscores.technical, SUBSCORE_MAXIMUMS.technical)],
      ['Metadata', `${score.subscores.metadata}/${SUBSCORE_MAXIMUMS.metadata}`, 'Title + description', scoreColor(score.subscores.metadata, SUBSCORE_MAXIMUMS.metadata)],
    ]);
    drawRule(ctx, 10);

    drawSectionHeading(ctx, 'Signals', 'What was found on the page and what it is worth');
    for (const { label, value, points, maxPoints } of describeSignals(facts, score.componentScores)) {
      drawTextBlock(ctx, `${label} (${points}/${maxPoints} pts)`, {
        font: 'bold',
        size: 10.5,
        color: scoreColor(points, maxPoints),
        lineHeight: 14,
        before: 2,
      });
      drawTextBlock(ctx, value, { size: 10, indent: 12, lineHeight: 13.5 });
    }

    drawSectionHeading(ctx, 'Speed Metrics');
    const resourceTypes = facts.speed.resourceTypes;
    drawLabelRows(ctx, [
      ['Time to first byte', `${facts.speed.timeToFirstByteMs} ms`],
      ['Total load time', `${facts.speed.totalTimeMs} ms`],
      ['Resources', `${facts.speed.resourceCount} (${resourceTypes.script ?? 0} scripts, ${resourceTypes.css ?? 0} stylesheets, ${resourceTypes.image ?? 0} images)`],
      ['Total size', `${(facts.speed.totalBytes / 1024).toFixed(1)} KB`],
      ['Performance score', `${facts.speed.performanceScore}/100`],
    ]);
    for (const warning of outcome.warnings) {
      drawTextBlock(ctx, warning, { size: 9.5, color: COLOR_WARN, before: 2 });
    }

    drawSectionHeading(ctx, 'Prioritized Recommendations', `${outcome.issues.length} issues, most urgent first`);
    drawIssues(ctx, outcome.issues, 'No issues found.');
  });
}

function recentImplementations(recommendations: Recommendation[]): Recommendation[] {
  return recommendations
    .filter(r => r.status === 'implemented')
    .sort((a, b) => (b.implementedAt?.getTime() ?? 0) - (a.implementedAt?.getTime() ?? 0))
    .slice(0, RECENT_IMPLEMENTATION_LIMIT);
}

export function generateProgressReportPdf(input: ProgressReportInput): Promise<Uint8Array> {
  const { summary } = input;
  return renderReport(input.url, 'SignalScore Progress Report', 'Answer engine visibility progress', ctx => {
    drawCover(ctx, 'Progress Report', input.generatedAt);

    const improvement = summary.totalImprovement;
    drawCardRow(ctx, [
      ['Initial', `${summary.initialScore}/100`, `Grade ${getGrade(summary.initialScore)}`, scoreColor(summary.initialScore, 100)],
      ['Current', `${summary.currentScore}/100`, `Grade ${getGrade(summary.currentScore)}`, scoreColor(summary.currentScore, 100)],
      ['Change', `${improvement >= 0 ? '+' : ''}${improvement}`, `${summary.scanCount} scans`, improvement >= 0 ? COLOR_GOOD : COLOR_BAD],
    ]);
    drawRule(ctx, 10);

    drawSectionHeading(ctx, 'Implementation Status');
    drawLabelRows(ctx, [
      ['Implemented', String(summary.implementedChanges)],
      ['Pending', String(summary.pendingChanges)],
      ['Points from changes', String(summary.implementationImpact)],
    ]);

    drawSectionHeading(ctx, 'Score History');
    for (const scan of summary.trendingData) {
      drawTextBlock(ctx, `${toDateStamp(scan.scannedAt)}  ${scan.totalScore}/100`, {
        font: 'mono',
        size: 9.5,
        lineHeight: 12.5,
      });
    }

    drawSectionHeading(ctx, 'Recent Implementations');
    const recent = recentImplementations(summary.recommendations);
    if (recent.length === 0) {
      drawTextBlock(ctx, 'No recommendations have been marked as implemented yet.', { color: COLOR_MUTED });
    }
    for (const rec of recent) {
      drawTextBlock(ctx, `${rec.description} (+${rec.pointsPotential} pts)`, {
        font: 'bold',
        size: 10.5,
        color: COLOR_GOOD,
        lineHeight: 14,
        before: 2,
      });
      drawTextBlock(ctx, `Implemented ${rec.implementedAt ? toDateStamp(rec.implementedAt) : 'unknown date'}${rec.notes ? ` | ${rec.notes}` : ''}`, {
        size: 9.5,
        color: COLOR_MUTED,
        indent: 12,
        lineHeight: 12.5,
      });
    }
  });
}
