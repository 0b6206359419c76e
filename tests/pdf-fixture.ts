import { writeFile } from 'node:fs/promises';

function escapeText(text: string): string {
  return text.replace(/([\\()])/g, '\\$1');
}

function pageContent(lines: readonly string[]): string {
  const body = lines.flatMap((line, index) => (index === 0 ? [`(${escapeText(line)}) Tj`] : ['0 -20 Td', `(${escapeText(line)}) Tj`]));
  return ['BT', '/F1 12 Tf', '72 720 Td', ...body, 'ET'].join('\n');
}

/**
 * Minimal PDF with one Helvetica text line per entry, each page on US Letter.
 * An empty page array gives a page with no text.
 */
export function buildPdf(pages: ReadonlyArray<readonly string[]>): Buffer {
  const pageId = (index: number) => 4 + index * 2;
  const bodies: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pages.map((_, index) => `${pageId(index)} 0 R`).join(' ')}] /Count ${pages.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>',
  ];

  pages.forEach((lines, index) => {
    const content = pageContent(lines);
    bodies.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${pageId(index) + 1} 0 R >>`,
      `<< /Length ${Buffer.byteLength(content, 'latin1')} >>\nstream\n${content}\nendstream`
    );
  });

  let out = '%PDF-1.4\n';
  const offsets: number[] = [];
  bodies.forEach((body, index) => {
    offsets.push(Buffer.byteLength(out, 'latin1'));
    out += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = Buffer.byteLength(out, 'latin1');
  out += `xref\n0 ${bodies.length + 1}\n0000000000 65535 f \n`;
  out += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  out += `trailer\n<< /Size ${bodies.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(out, 'latin1');
}

export async function writePdf(filePath: string, pages: ReadonlyArray<readonly string[]>): Promise<string> {
  await writeFile(filePath, buildPdf(pages));
  return filePath;
}
