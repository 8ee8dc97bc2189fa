import { ConfigurationError } from '@pdf-lingo/shared';
import { z } from 'zod';

/**
 * Multipart fields of `POST /translate`.
 */
export const translateFormSchema = z.object({
  file: z
    .instanceof(File, { message: "No file part in request (expected 'file')." })
    .refine((file) => file.name.length > 0, { message: 'No file selected.' })
    .refine((file) => file.name.toLowerCase().endsWith('.pdf'), {
      message: 'Please upload a .pdf file.',
    }),
  target: z.string().optional(),
  ocr_lang: z.string().optional(),
  dpi: z.string().optional(),
});

export type TranslateFormData = z.infer<typeof translateFormSchema>;

/** Values used for the optional fields a request leaves out */
export interface TranslationDefaults {
  targetLanguage: string;
  ocrLanguage: string;
  dpi: number;
}

export interface TranslateFormRequest {
  file: File;
  targetLanguage: string;
  ocrLanguage: string;
  dpi: number;
}

type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Parse and validate the multipart form. Blank text fields count as absent.
 */
export function parseTranslateFormData(
  formData: FormData,
): ParseResult<TranslateFormData> {
  const dataToValidate: Record<string, unknown> = {};
  for (const key of ['file', 'target', 'ocr_lang', 'dpi'] as const) {
    const value = formData.get(key);
    if (typeof value === 'string' && value.trim().length === 0) {
      continue;
    }
    if (value !== null) {
      dataToValidate[key] = typeof value === 'string' ? value.trim() : value;
    }
  }

  const result = translateFormSchema.safeParse(dataToValidate);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, data: result.data };
}

/**
 * Fill in defaults and parse `dpi`.
 *
 * @throws ConfigurationError when `dpi` is not an integer
 */
export function toTranslateFormRequest(
  form: TranslateFormData,
  defaults: TranslationDefaults,
): TranslateFormRequest {
  let dpi = defaults.dpi;
  if (form.dpi !== undefined) {
    if (!/^[+-]?\d+$/.test(form.dpi)) {
      throw new ConfigurationError(
        'dpi',
        `must be an integer, got '${form.dpi}'`,
      );
    }
    dpi = Number.parseInt(form.dpi, 10);
  }

  return {
    file: form.file,
    targetLanguage: form.target ?? defaults.targetLanguage,
    ocrLanguage: form.ocr_lang ?? defaults.ocrLanguage,
    dpi,
  };
}
