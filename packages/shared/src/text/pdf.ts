/**
 * PDF Text Extraction
 *
 * Extracts text from PDF bytes using pdfjs-dist. The library is loaded on first use.
 */

import path from 'path';
import { logger } from '../logger';

type PdfJs = typeof import('pdfjs-dist');

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  text: string;
}

let pdfjsPromise: Promise<PdfJs> | null = null;

function loadPdfJs(): Promise<PdfJs> {
  if (!pdfjsPromise) {
    pdfjsPromise = import('pdfjs-dist').then((pdfjsLib) => {
      // Configure worker for Node.js environment
      pdfjsLib.GlobalWorkerOptions.workerSrc = path.join(
        path.dirname(require.resolve('pdfjs-dist/package.json')),
        'build/pdf.worker.js'
      );
      return pdfjsLib;
    });
  }
  return pdfjsPromise;
}

/**
 * Extract text from PDF bytes, preserving line structure.
 *
 * Groups text items by Y position to maintain document layout, so header lines
 * such as "From:" or "Subject:" survive as lines of their own.
 */
export async function extractTextFromPdf(data: Uint8Array): Promise<PdfTextResult> {
  const pdfjsLib = await loadPdfJs();
  const pdf = await pdfjsLib.getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      // Group text items by Y position to preserve line structure
      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!('str' in item)) continue;
        const str = item.str.trim();
        if (str === '') continue;

        // Text on the same visual line may have slight Y variations
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str });
        itemsByY.set(y, line);
      }

      // Top to bottom, then left to right
      const lines = Array.from(itemsByY.entries())
        .sort(([a], [b]) => b - a)
        .map(([, items]) =>
          items
            .sort((a, b) => a.x - b.x)
            .map((item) => item.str)
            .join(' ')
            .trim()
        )
        .filter((line) => line.length > 0);

      pages.push({ pageNumber: pageNum, text: lines.join('\n') });
    }

    const text = pages.map((page) => page.text).join('\n\n');

    logger.info('PDF text extraction complete', {
      totalPages: pdf.numPages,
      totalChars: text.length,
    });

    return { pages, totalPages: pdf.numPages, text };
  } finally {
    await pdf.destroy();
  }
}
