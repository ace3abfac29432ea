import { PDFDocument, StandardFonts } from 'pdf-lib';
import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

interface SampleContract {
  title: string;
  lines: string[];
}

// Layouts mirror the labels config/extraction-rules.json looks for
const CONTRACTS: Record<string, SampleContract> = {
  'sample-contract-en': {
    title: 'Water Treatment Purchase Agreement',
    lines: [
      'Date: 03/14/2026',
      'Lead/PO# F12345678',
      'Salesperson Name: Johnny Smith',
      '',
      'Rivera Daniel',
      'Customer Last Name Customer First Name',
      '786-555-0142 305-555-0100',
      'Home Phone# Cell Phone#',
      '1420 SW 87 AVE Miami FL 33174',
      '',
      'Water Conditioning System Qty 1 Model # EC5, QRS, RO System',
      'Contract Price: $10,995',
      'Payment Method: Finance',
      '',
      '____________________________',
      'Customer Signature',
    ],
  },
  'sample-contract-es': {
    title: 'Acuerdo de Compra',
    lines: [
      'Fecha: 02/03/2026',
      'Nombre del vendedor: Pepe Nunez',
      '',
      'Ramirez Ana',
      'Apellido del Cliente Nombre del Cliente',
      'Casa # Trabajo #',
      '(954) 555-0199',
      '',
      'Modelo # TC, UV Sistema',
      'Precio del Contrato: $8,450.50',
      'Meta de Pago: Cash',
    ],
  },
};

async function generatePdf(outDir: string, name: string, { title, lines }: SampleContract): Promise<void> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const boldFont = await doc.embedFont(StandardFonts.HelveticaBold);
  const page = doc.addPage([612, 792]); // US Letter

  let y = 740;

  page.drawText(title, { x: 50, y, font: boldFont, size: 16 });
  y -= 30;

  page.drawLine({ start: { x: 50, y }, end: { x: 562, y }, thickness: 1 });
  y -= 20;

  for (const line of lines) {
    if (line === '') {
      y -= 10;
      continue;
    }
    page.drawText(line, { x: 50, y, font, size: 11 });
    y -= 16;
  }

  const outPath = resolve(outDir, `${name}.pdf`);
  await writeFile(outPath, await doc.save());
  console.log(`Created: ${outPath}`);
}

async function main(): Promise<void> {
  const outDir = resolve(process.argv[2] ?? process.env.CONTRACTS_DIR ?? './contracts/inbox');
  await mkdir(outDir, { recursive: true });

  for (const [name, contract] of Object.entries(CONTRACTS)) {
    await generatePdf(outDir, name, contract);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
