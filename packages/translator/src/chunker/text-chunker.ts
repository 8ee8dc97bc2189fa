import { ConfigurationError } from '@pdf-lingo/shared';

import { TEXT_CHUNKER } from '../config/constants';

/**
 * Splits text into chunks no longer than a maximum length, keeping
 * paragraphs (blocks separated by a blank line) whole whenever they fit.
 *
 * Lengths are counted in Unicode code points, so a hard split never cuts a
 * surrogate pair.
 */
export class TextChunker {
  /**
   * Greedily packs paragraphs into chunks joined by `\n\n`. A paragraph
   * longer than `maxLength` is emitted as consecutive `maxLength` slices of
   * its own.
   *
   * @throws ConfigurationError when maxLength is not a positive integer
   */
  static chunk(
    text: string,
    maxLength: number = TEXT_CHUNKER.DEFAULT_MAX_LENGTH,
  ): string[] {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new ConfigurationError(
        'maxLength',
        `must be a positive integer, got ${maxLength}`,
      );
    }
    if (text.length === 0) {
      return [];
    }

    const separator = TEXT_CHUNKER.PARAGRAPH_SEPARATOR;
    const separatorLength = separator.length;
    const paragraphs = text
      .split(separator)
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0);

    const chunks: string[] = [];
    let buffer: string[] = [];
    let bufferLength = 0;

    const flush = (): void => {
      if (buffer.length > 0) {
        chunks.push(buffer.join(separator));
        buffer = [];
        bufferLength = 0;
      }
    };

    for (const paragraph of paragraphs) {
      const codePoints = Array.from(paragraph);

      if (codePoints.length > maxLength) {
        flush();
        for (let start = 0; start < codePoints.length; start += maxLength) {
          chunks.push(codePoints.slice(start, start + maxLength).join(''));
        }
        continue;
      }

      const overhead = buffer.length > 0 ? separatorLength : 0;
      if (bufferLength + codePoints.length + overhead > maxLength) {
        flush();
        buffer.push(paragraph);
        bufferLength = codePoints.length;
      } else {
        buffer.push(paragraph);
        bufferLength += codePoints.length + overhead;
      }
    }

    flush();
    return chunks;
  }
}
