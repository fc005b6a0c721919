import { makeRect, type ContentBlock } from '@trimfit/core';

export interface PdfTextItem {
  readonly str?: string;
  readonly transform?: readonly number[];
  readonly width?: number;
  readonly height?: number;
  readonly fontName?: string;
}

export interface PdfTextStyle {
  readonly ascent?: number;
  readonly descent?: number;
}

export interface PdfTextContent {
  readonly items: readonly PdfTextItem[];
  readonly styles: Readonly<Record<string, PdfTextStyle>>;
}

/**
 * One block per text run. The box runs from the font's descent below the
 * baseline to one font height above it.
 */
export function collectTextBlocks(content: PdfTextContent): ContentBlock[] {
  const blocks: ContentBlock[] = [];

  for (const item of content.items) {
    // Marked-content entries and end-of-line markers carry no glyphs
    if (typeof item.str !== 'string' || item.str.length === 0) continue;
    if (!item.transform || item.transform.length < 6) continue;

    const x = item.transform[4];
    const baseline = item.transform[5];
    const width = finiteOrZero(item.width);
    const height = finiteOrZero(item.height);
    const descent = item.fontName ? finiteOrZero(content.styles[item.fontName]?.descent) : 0;

    if (!Number.isFinite(x) || !Number.isFinite(baseline)) continue;

    blocks.push({
      kind: 'text',
      rect: makeRect(x, baseline + Math.min(descent, 0) * height, x + width, baseline + height),
    });
  }

  return blocks;
}

function finiteOrZero(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? value : 0;
}
