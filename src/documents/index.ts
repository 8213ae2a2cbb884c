// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Document ingestion: loading, normalization and chunking.
 */

export { DocumentLoader, detectFormat, getSupportedExtensions } from './loader.js';
export type { DocumentLoaderOptions } from './loader.js';
export { TextChunker, DEFAULT_CHUNKER_CONFIG } from './chunker.js';
export type { ChunkerConfig } from './chunker.js';
export { PdfExtractor, PAGE_SEPARATOR } from './pdf.js';
export { DocxExtractor } from './docx.js';
export { normalizeText } from './normalize.js';
