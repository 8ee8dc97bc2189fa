/**
 * OCR capability: turns a rendered page image into text.
 *
 * Implementations return an empty string when the image holds no readable
 * text and reject only when recognition itself could not run.
 */
export interface OcrEngine {
  recognize(
    imagePath: string,
    language: string,
    options?: { abortSignal?: AbortSignal },
  ): Promise<string>;
}
