// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Strict UTF-8 decoding for plain text and markdown uploads.
 */

import * as fs from 'fs';
import { DecodeError, DocumentReadError, DocumentTooLargeError } from '../errors.js';

function decodeFailure(name: string, error: unknown): DecodeError {
  return new DecodeError(`${name} is not valid UTF-8`, { cause: error });
}

/**
 * Decode a whole buffer. Invalid byte sequences raise DecodeError.
 */
export function decodeUtf8(bytes: Uint8Array, name = 'document'): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw decodeFailure(name, error);
  }
}

/**
 * Stream a text file through a fatal decoder, stopping once `maxBytes` is crossed.
 */
export async function readUtf8File(filePath: string, maxBytes: number): Promise<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  const stream = fs.createReadStream(filePath);
  let bytesRead = 0;
  let text = '';

  try {
    for await (const chunk of stream) {
      if (!(chunk instanceof Uint8Array)) continue;
      bytesRead += chunk.byteLength;
      if (bytesRead > maxBytes) {
        throw new DocumentTooLargeError(maxBytes);
      }
      text += decoder.decode(chunk, { stream: true });
    }
    text += decoder.decode();
  } catch (error) {
    if (error instanceof DocumentTooLargeError) throw error;
    if (error instanceof TypeError) throw decodeFailure(filePath, error);
    throw new DocumentReadError(filePath, error);
  } finally {
    stream.destroy();
  }

  return text;
}
