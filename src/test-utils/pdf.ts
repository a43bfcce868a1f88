// src/test-utils/pdf.ts
// What: Builds small, valid single-font PDFs in memory for extractor tests.
// How: One Helvetica text line per page, plus an optional info dictionary; byte offsets for the xref table
//      are computed from the ASCII body.

function escapePdfString(text: string): string {
  return text.replace(/([\\()])/g, '\\$1');
}

export interface PdfInfo {
  creator?: string;
  creationDate?: string; // PDF date string, e.g. D:20240501120000Z
}

export function buildPdf(pageTexts: string[], info: PdfInfo = {}): Buffer {
  const objects: string[] = [];
  const pageCount = pageTexts.length;
  // 1: catalog, 2: page tree, 3: font, then a (page, content) pair per page
  const pageObjectNumbers = pageTexts.map((_, i) => 4 + i * 2);

  objects.push('<< /Type /Catalog /Pages 2 0 R >>');
  objects.push(`<< /Type /Pages /Kids [${pageObjectNumbers.map((n) => `${n} 0 R`).join(' ')}] /Count ${pageCount} >>`);
  objects.push('<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>');
  pageTexts.forEach((text, i) => {
    const contentNumber = pageObjectNumbers[i] + 1;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentNumber} 0 R >>`,
    );
    const stream = text ? `BT /F1 12 Tf 72 720 Td (${escapePdfString(text)}) Tj ET` : '';
    objects.push(`<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`);
  });

  const infoEntries = [
    info.creator === undefined ? '' : `/Creator (${escapePdfString(info.creator)})`,
    info.creationDate === undefined ? '' : `/CreationDate (${escapePdfString(info.creationDate)})`,
  ].filter(Boolean);
  let infoRef = '';
  if (infoEntries.length > 0) {
    objects.push(`<< ${infoEntries.join(' ')} >>`);
    infoRef = ` /Info ${objects.length} 0 R`;
  }

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((obj, i) => {
    offsets.push(body.length);
    body += `${i + 1} 0 obj\n${obj}\nendobj\n`;
  });

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length + 1}\n`;
  body += '0000000000 65535 f \n';
  for (const off of offsets) {
    body += `${String(off).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R${infoRef} >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(body, 'latin1');
}
