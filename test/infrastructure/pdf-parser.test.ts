import { describe, it, expect } from 'vitest';
import { extractTextFromPdf } from '../../src/infrastructure/pdf-parser.js';

// Single-page PDF drawing one line of Helvetica text
function createTestPdf(text: string): Uint8Array {
  const stream = `BT /F1 12 Tf 72 720 Td (${text}) Tj ET`;
  const content = `%PDF-1.4
1 0 obj<</Type/Catalog/Pages 2 0 R>>endobj
2 0 obj<</Type/Pages/Kids[3 0 R]/Count 1>>endobj
3 0 obj<</Type/Page/Parent 2 0 R/MediaBox[0 0 612 792]/Contents 4 0 R/Resources<</Font<</F1 5 0 R>>>>>>endobj
5 0 obj<</Type/Font/Subtype/Type1/BaseFont/Helvetica>>endobj
4 0 obj<</Length ${stream.length}>>
stream
${stream}
endstream
endobj
trailer<</Size 6/Root 1 0 R>>
%%EOF`;
  return new TextEncoder().encode(content);
}

function createBlankPdf(): Uint8Array {
  const content = `%PDF-1.4
1 0 obj<</Type/Catalog/Pages 2 0 R>>endobj
2 0 obj<</Type/Pages/Kids[3 0 R]/Count 1>>endobj
3 0 obj<</Type/Page/Parent 2 0 R/MediaBox[0 0 612 792]/Resources<<>>>>endobj
trailer<</Size 4/Root 1 0 R>>
%%EOF`;
  return new TextEncoder().encode(content);
}

describe('extractTextFromPdf', () => {
  it('extracts text from a valid PDF', async () => {
    const result = await extractTextFromPdf(createTestPdf('Salesperson Name: Maria Lopez'), 'contract.pdf');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toContain('Salesperson Name: Maria Lopez');
  });

  it('returns PDF_PARSE_FAILED for data that is not a PDF', async () => {
    const result = await extractTextFromPdf(new TextEncoder().encode('not a pdf at all'));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PDF_PARSE_FAILED');
    expect(result.error.retryable).toBe(false);
  });

  it('returns PDF_EMPTY for a page without text', async () => {
    const result = await extractTextFromPdf(createBlankPdf());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PDF_EMPTY');
  });

  it('returns PDF_TOO_LARGE for oversized input', async () => {
    const result = await extractTextFromPdf(new Uint8Array(11 * 1024 * 1024));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PDF_TOO_LARGE');
    expect(result.error.message).toBe(`PDF size ${11 * 1024 * 1024} bytes exceeds ${10 * 1024 * 1024} byte limit`);
  });
});
