// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * PdfExtractor - Extract text from PDF documents page by page.
 *
 * Only the text layer is read; images, annotations and form fields are ignored.
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DecodeError } from '../errors.js';
import { logger } from '../logger.js';
import { normalizeText } from './normalize.js';

/** Inserted between the text of consecutive pages */
export const PAGE_SEPARATOR = '\n\n';

export interface PdfExtractionResult {
  /** Normalized text of each page that has any, in page order */
  pages: string[];
  pageCount: number;
}

/**
 * PdfExtractor - Extract text from PDF
 */
export class PdfExtractor {
  /**
   * Extract the text of every page.
   * @throws DecodeError if the bytes are not a readable PDF
   */
  async extract(bytes: Uint8Array, name = 'document.pdf'): Promise<PdfExtractionResult> {
    // pdf.js takes ownership of the buffer it is given
    const loadingTask = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
    });

    try {
      const pdf = await loadingTask.promise;
      const pages: string[] = [];

      // Pages are read one at a time so only the current page's text layer is in memory
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
          if ('str' in item) {
            text += item.str;
            if (item.hasEOL) text += '\n';
          }
        }
        page.cleanup();

        const normalized = normalizeText(text);
        if (normalized) pages.push(normalized);
      }

      logger.debug(`PDF ${name}: ${pages.length}/${pdf.numPages} pages with text`);
      return { pages, pageCount: pdf.numPages };
    } catch (error) {
      throw new DecodeError(
        `${name} could not be read as PDF: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      await loadingTask.destroy();
    }
  }
}
