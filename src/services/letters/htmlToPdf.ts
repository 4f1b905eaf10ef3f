// src/services/letters/htmlToPdf.ts
import PDFDocument from 'pdfkit';
import { load } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import logger from '../../utils/logging';
import { resolveFileWithin } from '../../utils/pathSafety';
import type { FontFamily, HeadingLevel, RenderConfig } from './renderConfig';

/**
 * Lays out the HTML produced by the letter templates onto PDF pages.
 *
 * Supported markup: h1-h4, p, div-like containers, b/strong, i/em, u, span,
 * br, table/tr/td/th (percentage widths), ul/ol/li, hr and img. Layout is
 * driven by class names rather than CSS:
 *   center | right | left | justify   alignment
 *   bold | italic | underline         text style
 *   small | large                     font size
 *   indent                            left indent for containers
 *   spacer | spacer-lg | page-break   vertical space / new page
 *   bordered (table), double | thick (hr)
 */

type Align = 'left' | 'center' | 'right' | 'justify';

interface TextStyle {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  fontSize: number;
  align: Align;
}

interface TextRun {
  text: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
}

interface Frame {
  x: number;
  width: number;
}

interface LayoutContext {
  doc: PDFKit.PDFDocument;
  config: RenderConfig;
  assetsDir?: string;
  traceId?: string;
}

export interface HtmlToPdfOptions {
  /** Images are only embedded from inside this directory */
  assetsDir?: string;
  traceId?: string;
}

const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'p',
  'div',
  'section',
  'article',
  'header',
  'footer',
  'main',
  'blockquote',
  'h1',
  'h2',
  'h3',
  'h4',
  'table',
  'ul',
  'ol',
  'hr',
  'img',
]);

const IGNORED_TAGS: ReadonlySet<string> = new Set(['head', 'title', 'style', 'script', 'meta', 'link']);

const CELL_PADDING = 2;
const LIST_INDENT = 18;
const CONTAINER_INDENT = 28;
const DEFAULT_IMAGE_SIZE = 60;

export function htmlToPdf(html: string, config: RenderConfig, options: HtmlToPdfOptions = {}): Promise<Buffer> {
  const $ = load(html);
  const title = $('title').text().trim() || undefined;
  const body = $('body').get(0);
  const nodes: AnyNode[] = body ? body.children : [];

  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      size: config.pageSize,
      margins: { ...config.margins },
      info: {
        ...(title ? { Title: title } : {}),
        Producer: config.producer,
        Creator: config.producer,
      },
    });

    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      const ctx: LayoutContext = {
        doc,
        config,
        assetsDir: options.assetsDir,
        traceId: options.traceId,
      };
      const baseStyle: TextStyle = {
        bold: false,
        italic: false,
        underline: false,
        fontSize: config.fontSize,
        align: 'left',
      };

      doc.font(config.fonts.regular).fontSize(config.fontSize);
      renderFlow(ctx, nodes, baseStyle, {
        x: config.margins.left,
        width: doc.page.width - config.margins.left - config.margins.right,
      });
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

/**
 * Render a mixed list of nodes: consecutive inline nodes form one paragraph,
 * block elements are laid out in order.
 */
function renderFlow(ctx: LayoutContext, nodes: AnyNode[], style: TextStyle, frame: Frame): void {
  let pending: AnyNode[] = [];

  const flush = () => {
    if (pending.length > 0) {
      renderParagraph(ctx, pending, style, frame, 0);
      pending = [];
    }
  };

  for (const node of nodes) {
    if (isTag(node) && IGNORED_TAGS.has(node.tagName)) {
      continue;
    }
    if (isTag(node) && BLOCK_TAGS.has(node.tagName)) {
      flush();
      renderBlock(ctx, node, style, frame);
    } else {
      pending.push(node);
    }
  }

  flush();
}

function renderBlock(ctx: LayoutContext, el: Element, style: TextStyle, frame: Frame): void {
  const tag = el.tagName;

  if (isHeading(tag)) {
    const headingStyle = applyClasses(el, {
      ...style,
      bold: true,
      fontSize: ctx.config.headingSizes[tag],
    });
    renderParagraph(ctx, el.children, headingStyle, frame, 0.3);
    return;
  }

  switch (tag) {
    case 'p':
      renderParagraph(ctx, el.children, applyClasses(el, style), frame, 0.5);
      return;
    case 'table':
      renderTable(ctx, el, style, frame);
      return;
    case 'ul':
    case 'ol':
      renderList(ctx, el, style, frame);
      return;
    case 'hr':
      renderRule(ctx, el, frame);
      return;
    case 'img':
      renderImage(ctx, el, style, frame);
      return;
    default:
      renderContainer(ctx, el, style, frame);
  }
}

function renderContainer(ctx: LayoutContext, el: Element, style: TextStyle, frame: Frame): void {
  const classes = classesOf(el);

  if (classes.includes('page-break')) {
    ctx.doc.addPage();
    return;
  }
  if (classes.includes('spacer-lg')) {
    ctx.doc.moveDown(3);
    return;
  }
  if (classes.includes('spacer')) {
    ctx.doc.moveDown(1);
    return;
  }

  const inner = classes.includes('indent')
    ? { x: frame.x + CONTAINER_INDENT, width: frame.width - CONTAINER_INDENT }
    : frame;

  renderFlow(ctx, el.children, applyClasses(el, style), inner);
}

function renderParagraph(
  ctx: LayoutContext,
  nodes: AnyNode[],
  style: TextStyle,
  frame: Frame,
  spacingAfter: number
): void {
  const collected: TextRun[] = [];
  collectRuns(nodes, style, collected);
  const runs = tidyRuns(collected);

  if (runs.length === 0) {
    return;
  }

  const { doc, config } = ctx;
  doc.fontSize(style.fontSize);

  runs.forEach((run, index) => {
    const options = {
      width: frame.width,
      align: style.align,
      underline: run.underline,
      continued: index < runs.length - 1,
      lineGap: config.lineGap,
    };
    doc.font(fontFor(run, config.fonts));
    if (index === 0) {
      doc.text(run.text, frame.x, doc.y, options);
    } else {
      doc.text(run.text, options);
    }
  });

  doc.x = frame.x;
  if (spacingAfter > 0) {
    doc.moveDown(spacingAfter);
  }
}

function renderTable(ctx: LayoutContext, table: Element, style: TextStyle, frame: Frame): void {
  const { doc, config } = ctx;
  const tableStyle = applyClasses(table, style);
  const bordered = classesOf(table).includes('bordered');
  const pageBottom = doc.page.height - config.margins.bottom;

  for (const row of tableRows(table)) {
    const cells = row.children.filter(
      (node): node is Element => isTag(node) && (node.tagName === 'td' || node.tagName === 'th')
    );
    if (cells.length === 0) {
      continue;
    }

    doc.fontSize(tableStyle.fontSize);
    if (doc.y + doc.currentLineHeight(true) * 2 > pageBottom) {
      doc.addPage();
    }

    const widths = columnWidths(cells, frame.width);
    const rowTop = doc.y;
    let rowBottom = rowTop;
    let x = frame.x;

    cells.forEach((cell, index) => {
      const width = widths[index];
      const cellStyle = applyClasses(cell, cell.tagName === 'th' ? { ...tableStyle, bold: true } : tableStyle);

      doc.y = rowTop + CELL_PADDING;
      renderFlow(ctx, cell.children, cellStyle, {
        x: x + CELL_PADDING,
        width: Math.max(width - CELL_PADDING * 2, 1),
      });
      rowBottom = Math.max(rowBottom, doc.y + CELL_PADDING);
      x += width;
    });

    if (bordered) {
      let cellX = frame.x;
      doc.save().lineWidth(0.5);
      for (const width of widths) {
        doc.rect(cellX, rowTop, width, rowBottom - rowTop).stroke();
        cellX += width;
      }
      doc.restore();
    }

    doc.y = rowBottom;
  }

  doc.x = frame.x;
  doc.moveDown(0.3);
}

function renderList(ctx: LayoutContext, list: Element, style: TextStyle, frame: Frame): void {
  const { doc, config } = ctx;
  const ordered = list.tagName === 'ol';
  const items = list.children.filter((node): node is Element => isTag(node) && node.tagName === 'li');

  items.forEach((item, index) => {
    const itemStyle = applyClasses(item, style);
    const top = doc.y;

    doc
      .font(config.fonts.regular)
      .fontSize(itemStyle.fontSize)
      .text(ordered ? `${index + 1}.` : '•', frame.x, top, { width: LIST_INDENT, lineGap: config.lineGap });

    doc.y = top;
    renderFlow(ctx, item.children, itemStyle, {
      x: frame.x + LIST_INDENT,
      width: frame.width - LIST_INDENT,
    });
  });

  doc.x = frame.x;
  doc.moveDown(0.3);
}

function renderRule(ctx: LayoutContext, hr: Element, frame: Frame): void {
  const { doc } = ctx;
  const classes = classesOf(hr);
  const double = classes.includes('double');
  const y = doc.y + 2;

  doc.save();
  doc
    .lineWidth(classes.includes('thick') || double ? 2 : 0.75)
    .moveTo(frame.x, y)
    .lineTo(frame.x + frame.width, y)
    .stroke();
  if (double) {
    doc
      .lineWidth(0.75)
      .moveTo(frame.x, y + 3)
      .lineTo(frame.x + frame.width, y + 3)
      .stroke();
  }
  doc.restore();

  doc.x = frame.x;
  doc.y = y + (double ? 8 : 5);
}

function renderImage(ctx: LayoutContext, img: Element, style: TextStyle, frame: Frame): void {
  const { doc } = ctx;
  const src = img.attribs.src;

  if (!src || !ctx.assetsDir) {
    return;
  }

  const file = resolveFileWithin(ctx.assetsDir, src);
  if (!file) {
    logger.security('Image skipped: not a file inside the assets directory', {
      trace_id: ctx.traceId,
      image_src: src,
    });
    return;
  }

  const width = Math.min(parseDimension(img.attribs.width) ?? DEFAULT_IMAGE_SIZE, frame.width);
  const height = parseDimension(img.attribs.height) ?? width;
  const align = classesOf(img).includes('center') ? 'center' : style.align;
  let x = frame.x;
  if (align === 'center') {
    x = frame.x + (frame.width - width) / 2;
  } else if (align === 'right') {
    x = frame.x + frame.width - width;
  }

  const top = doc.y;
  try {
    doc.image(file, x, top, { fit: [width, height], align: 'center', valign: 'center' });
  } catch (error) {
    logger.warn('Image could not be embedded, skipped', {
      trace_id: ctx.traceId,
      image_src: src,
      error: (error as Error).message,
    });
    return;
  }

  doc.x = frame.x;
  doc.y = top + height;
}

function collectRuns(nodes: AnyNode[], style: TextStyle, runs: TextRun[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      runs.push({
        text: node.data.replace(/\s+/g, ' '),
        bold: style.bold,
        italic: style.italic,
        underline: style.underline,
      });
      continue;
    }

    if (!isTag(node) || IGNORED_TAGS.has(node.tagName) || node.tagName === 'img') {
      continue;
    }

    if (node.tagName === 'br') {
      runs.push({ text: '\n', bold: style.bold, italic: style.italic, underline: false });
      continue;
    }

    collectRuns(node.children, inlineStyle(node, style), runs);
  }
}

/**
 * Collapse whitespace across run boundaries and trim the paragraph edges
 */
function tidyRuns(runs: TextRun[]): TextRun[] {
  const tidy: TextRun[] = [];

  for (const run of runs) {
    const previous = tidy.length > 0 ? tidy[tidy.length - 1] : undefined;
    let text = run.text;

    if (!previous || previous.text.endsWith(' ') || previous.text.endsWith('\n')) {
      text = text.replace(/^ +/, '');
    }
    if (text === '\n' && previous) {
      previous.text = previous.text.replace(/ +$/, '');
    }
    if (text.length > 0) {
      tidy.push({ ...run, text });
    }
  }

  while (tidy.length > 0) {
    const last = tidy[tidy.length - 1];
    last.text = last.text.replace(/[ \n]+$/, '');
    if (last.text.length > 0) {
      break;
    }
    tidy.pop();
  }

  return tidy.filter((run) => run.text.length > 0);
}

function tableRows(table: Element): Element[] {
  const rows: Element[] = [];

  for (const child of table.children) {
    if (!isTag(child)) {
      continue;
    }
    if (child.tagName === 'tr') {
      rows.push(child);
    } else if (child.tagName === 'thead' || child.tagName === 'tbody' || child.tagName === 'tfoot') {
      rows.push(...child.children.filter((node): node is Element => isTag(node) && node.tagName === 'tr'));
    }
  }

  return rows;
}

/**
 * Cells with a percentage `width` get that share; the rest split what is left
 */
export function columnWidths(cells: Element[], totalWidth: number): number[] {
  const declared = cells.map((cell) => parsePercent(cell.attribs.width));
  const declaredTotal = declared.reduce<number>((sum, share) => sum + (share ?? 0), 0);
  const undeclared = declared.filter((share) => share === undefined).length;
  const remaining = Math.max(0, 1 - declaredTotal);

  return declared.map((share) => {
    const fraction = share ?? (undeclared > 0 ? remaining / undeclared : 0);
    return fraction * totalWidth;
  });
}

function parsePercent(value: string | undefined): number | undefined {
  const match = value ? /^(\d+(?:\.\d+)?)%$/.exec(value.trim()) : null;
  return match ? Number(match[1]) / 100 : undefined;
}

function parseDimension(value: string | undefined): number | undefined {
  const match = value ? /^(\d+(?:\.\d+)?)(?:px|pt)?$/.exec(value.trim()) : null;
  return match ? Number(match[1]) : undefined;
}

function isHeading(tag: string): tag is HeadingLevel {
  return tag === 'h1' || tag === 'h2' || tag === 'h3' || tag === 'h4';
}

function classesOf(el: Element): string[] {
  return (el.attribs.class ?? '').split(/\s+/).filter((name) => name.length > 0);
}

function applyClasses(el: Element, style: TextStyle): TextStyle {
  const next: TextStyle = { ...style };

  for (const name of classesOf(el)) {
    switch (name) {
      case 'left':
      case 'center':
      case 'right':
      case 'justify':
        next.align = name;
        break;
      case 'bold':
        next.bold = true;
        break;
      case 'italic':
        next.italic = true;
        break;
      case 'underline':
        next.underline = true;
        break;
      case 'small':
        next.fontSize = style.fontSize - 2;
        break;
      case 'large':
        next.fontSize = style.fontSize + 2;
        break;
    }
  }

  return next;
}

function inlineStyle(el: Element, style: TextStyle): TextStyle {
  const next: TextStyle = { ...style };

  switch (el.tagName) {
    case 'b':
    case 'strong':
      next.bold = true;
      break;
    case 'i':
    case 'em':
      next.italic = true;
      break;
    case 'u':
      next.underline = true;
      break;
  }

  return applyClasses(el, next);
}

function fontFor(run: TextRun, fonts: FontFamily): string {
  if (run.bold && run.italic) {
    return fonts.boldItalic;
  }
  if (run.bold) {
    return fonts.bold;
  }
  return run.italic ? fonts.italic : fonts.regular;
}
