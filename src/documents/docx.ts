// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * DocxExtractor - Extract paragraph text from DOCX documents.
 */

import mammoth from 'mammoth';
import { DecodeError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * DocxExtractor - Extract text from DOCX
 */
export class DocxExtractor {
  /**
   * Extract paragraph text in document order.
   * Styles, images and embedded objects are dropped by mammoth's raw text mode.
   * @throws DecodeError if the bytes are not a readable DOCX archive
   */
  async extract(bytes: Uint8Array, name = 'document.docx'): Promise<string> {
    try {
      const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
      for (const message of result.messages) {
        logger.debug(`DOCX ${name}: ${message.message}`);
      }
      return result.value;
    } catch (error) {
      throw new DecodeError(
        `${name} could not be read as DOCX: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
