// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Document Loader
 *
 * Turns an uploaded file or pasted text into normalized plain text.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MAX_DOCUMENT_BYTES } from '../constants.js';
import { DocumentReadError, DocumentTooLargeError, UnsupportedFormatError } from '../errors.js';
import { logger } from '../logger.js';
import type { DocumentFormat, NormalizedText, SourceDocument } from '../types.js';
import { DocxExtractor } from './docx.js';
import { normalizeText } from './normalize.js';
import { PAGE_SEPARATOR, PdfExtractor } from './pdf.js';
import { decodeUtf8, readUtf8File } from './text.js';

/**
 * File extensions mapped to the format they are parsed as.
 */
const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.txt': 'text',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.pdf': 'pdf',
  '.docx': 'docx',
};

/**
 * Get list of supported file extensions.
 */
export function getSupportedExtensions(): string[] {
  return Object.keys(EXTENSION_FORMATS);
}

/**
 * Resolve the format of a file from its extension.
 * @throws UnsupportedFormatError for any extension not in the supported list
 */
export function detectFormat(fileName: string): DocumentFormat {
  const extension = path.extname(fileName).toLowerCase();
  const format = EXTENSION_FORMATS[extension];
  if (!format) {
    throw new UnsupportedFormatError(extension);
  }
  return format;
}

export interface DocumentLoaderOptions {
  /** Uploads larger than this many bytes are rejected */
  maxDocumentBytes?: number;
  pdfExtractor?: PdfExtractor;
  docxExtractor?: DocxExtractor;
}

/**
 * Loads documents of the supported formats into NormalizedText.
 * Holds no state between calls.
 */
export class DocumentLoader {
  private readonly maxDocumentBytes: number;
  private readonly pdfExtractor: PdfExtractor;
  private readonly docxExtractor: DocxExtractor;

  constructor(options: DocumentLoaderOptions = {}) {
    this.maxDocumentBytes = options.maxDocumentBytes ?? MAX_DOCUMENT_BYTES;
    this.pdfExtractor = options.pdfExtractor ?? new PdfExtractor();
    this.docxExtractor = options.docxExtractor ?? new DocxExtractor();
  }

  /**
   * Normalize a SourceDocument whose bytes are already in memory.
   */
  async loadDocument(source: SourceDocument): Promise<NormalizedText> {
    const name = source.name ?? `document (${source.format})`;
    this.assertSize(source.bytes.byteLength);

    const startTime = Date.now();
    const text = normalizeText(await this.extractText(source, name));
    logger.documentLoaded(name, source.format, text.length, (Date.now() - startTime) / 1000);
    return text;
  }

  /**
   * Load uploaded bytes, taking the format from the file name's extension.
   */
  async loadBuffer(bytes: Uint8Array, fileName: string): Promise<NormalizedText> {
    const format = detectFormat(fileName);
    return this.loadDocument({ format, bytes, name: path.basename(fileName) });
  }

  /**
   * Load a file from disk. Text formats are streamed; PDF and DOCX need
   * random access and are read whole after the size check.
   */
  async loadFile(filePath: string): Promise<NormalizedText> {
    const format = detectFormat(filePath);
    const name = path.basename(filePath);
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      throw new DocumentReadError(filePath, error);
    }
    this.assertSize(stats.size);

    if (format === 'text' || format === 'markdown') {
      const startTime = Date.now();
      const text = normalizeText(await readUtf8File(filePath, this.maxDocumentBytes));
      logger.documentLoaded(name, format, text.length, (Date.now() - startTime) / 1000);
      return text;
    }

    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new DocumentReadError(filePath, error);
    }
    return this.loadDocument({ format, bytes, name });
  }

  /**
   * Normalize text pasted directly into the interface.
   */
  fromPastedText(text: string): NormalizedText {
    return normalizeText(text);
  }

  private async extractText(source: SourceDocument, name: string): Promise<string> {
    switch (source.format) {
      case 'text':
      case 'markdown':
        return decodeUtf8(source.bytes, name);
      case 'pdf': {
        const { pages } = await this.pdfExtractor.extract(source.bytes, name);
        return pages.join(PAGE_SEPARATOR);
      }
      case 'docx':
        return this.docxExtractor.extract(source.bytes, name);
    }
  }

  private assertSize(byteLength: number): void {
    if (byteLength > this.maxDocumentBytes) {
      throw new DocumentTooLargeError(this.maxDocumentBytes, byteLength);
    }
  }
}
