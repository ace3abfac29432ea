import { createRequire } from 'node:module';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeError, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(
  require.resolve('pdfjs-dist/package.json'),
  '../standard_fonts/',
);

const MAX_PDF_SIZE_BYTES = 10 * 1024 * 1024; // 10MB

/**
 * Extracts page text, keeping the line breaks pdf.js reports so that
 * line-anchored extraction patterns keep working.
 */
export async function extractTextFromPdf(
  data: Uint8Array,
  documentId?: string,
): Promise<Result<string, AppError>> {
  const log = documentId
    ? logger.child({ documentId, step: 'parsing_pdf' })
    : logger.child({ step: 'parsing_pdf' });

  if (data.length > MAX_PDF_SIZE_BYTES) {
    log.error(
      { errorCode: ErrorCode.PDF_TOO_LARGE, retryable: false, sizeBytes: data.length },
      'PDF exceeds size limit',
    );
    return err(
      createAppError(
        ErrorCode.PDF_TOO_LARGE,
        `PDF size ${data.length} bytes exceeds ${MAX_PDF_SIZE_BYTES} byte limit`,
        false,
      ),
    );
  }

  let pdf;
  try {
    pdf = await getDocument({
      // pdf.js transfers the buffer it is given
      data: new Uint8Array(data),
      standardFontDataUrl: STANDARD_FONT_DATA_URL,
    }).promise;
  } catch (cause) {
    const details = describeError(cause);
    log.error({ errorCode: ErrorCode.PDF_PARSE_FAILED, retryable: false, details }, 'Failed to parse PDF');
    return err(
      createAppError(ErrorCode.PDF_PARSE_FAILED, 'Failed to parse PDF document', false, details),
    );
  }

  const pageCount = pdf.numPages;
  const textParts: string[] = [];
  try {
    for (let i = 1; i <= pageCount; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const pageText = content.items
        .filter((item): item is TextItem => 'str' in item)
        .map((item) => (item.hasEOL ? `${item.str}\n` : `${item.str} `))
        .join('')
        .replace(/[ \t]+\n/g, '\n');
      textParts.push(pageText);
    }
  } catch (cause) {
    const details = describeError(cause);
    log.error({ errorCode: ErrorCode.PDF_PARSE_FAILED, retryable: false, details }, 'Failed to extract text from PDF');
    return err(
      createAppError(ErrorCode.PDF_PARSE_FAILED, 'Failed to extract text from PDF', false, details),
    );
  } finally {
    await pdf.destroy();
  }

  const text = textParts.join('\n').trim();

  if (text.length === 0) {
    log.error({ errorCode: ErrorCode.PDF_EMPTY, retryable: false, pageCount }, 'PDF contains no text');
    return err(createAppError(ErrorCode.PDF_EMPTY, 'PDF contains no extractable text', false));
  }

  log.info({ pageCount, textLength: text.length }, 'PDF text extracted');
  return ok(text);
}
