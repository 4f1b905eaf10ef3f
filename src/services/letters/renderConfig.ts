// src/services/letters/renderConfig.ts

export type PageSize = 'A4' | 'LETTER' | 'LEGAL' | 'FOLIO';

export interface PageMargins {
  readonly top: number;
  readonly bottom: number;
  readonly left: number;
  readonly right: number;
}

export interface FontFamily {
  readonly regular: string;
  readonly bold: string;
  readonly italic: string;
  readonly boldItalic: string;
}

export type HeadingLevel = 'h1' | 'h2' | 'h3' | 'h4';

/**
 * Page and font settings shared by every render. Created once at startup
 * and handed to the renderer through the service container.
 */
export interface RenderConfig {
  readonly pageSize: PageSize;
  readonly margins: PageMargins;
  readonly fonts: FontFamily;
  readonly fontSize: number;
  readonly headingSizes: Readonly<Record<HeadingLevel, number>>;
  readonly lineGap: number;
  readonly producer: string;
}

export interface RenderConfigOptions {
  pageSize?: PageSize;
  fontSize?: number;
  margins?: Partial<PageMargins>;
}

// 2 cm top/bottom, 2.5 cm sides, in points
const DEFAULT_MARGINS: PageMargins = { top: 56.7, bottom: 56.7, left: 70.9, right: 70.9 };

const TIMES: FontFamily = Object.freeze({
  regular: 'Times-Roman',
  bold: 'Times-Bold',
  italic: 'Times-Italic',
  boldItalic: 'Times-BoldItalic',
});

export function createRenderConfig(options: RenderConfigOptions = {}): RenderConfig {
  const fontSize = options.fontSize ?? 12;

  return Object.freeze({
    pageSize: options.pageSize ?? 'A4',
    margins: Object.freeze({ ...DEFAULT_MARGINS, ...options.margins }),
    fonts: TIMES,
    fontSize,
    headingSizes: Object.freeze({
      h1: fontSize + 4,
      h2: fontSize + 2,
      h3: fontSize + 1,
      h4: fontSize,
    }),
    lineGap: 2,
    producer: 'letter-services',
  });
}
