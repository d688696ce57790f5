import type { CategoryName, Transaction } from "../src/types";
import { typeForAmount } from "../src/types";

export function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/** Build a transaction dated at local midnight of `isoDate`. */
export function makeTransaction(
  isoDate: string,
  amount: number,
  category: CategoryName = "other",
  overrides: Partial<Transaction> = {},
): Transaction {
  const [year, month, day] = isoDate.split("-").map(Number);
  return {
    date: new Date(year, month - 1, day),
    description: "Test transaction",
    amount,
    currency: "USD",
    category,
    confidence: 1,
    type: typeForAmount(amount),
    sourceRow: 0,
    categorySource: "rules",
    ...overrides,
  };
}

export interface PdfTextItem {
  text: string;
  x: number;
  y: number;
}

/** Build a minimal PDF whose pages draw the given strings in Helvetica. */
export function buildTextPdf(pages: PdfTextItem[][]): Uint8Array {
  const bodies: string[] = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "", // page tree, filled in below
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];
  const kids: string[] = [];
  for (const items of pages) {
    const pageNumber = bodies.length + 1;
    const contentNumber = pageNumber + 1;
    const stream = items.map(({ text, x, y }) => `BT /F1 12 Tf 1 0 0 1 ${x} ${y} Tm (${text}) Tj ET`).join("\n");
    bodies.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentNumber} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    );
    kids.push(`${pageNumber} 0 R`);
  }
  bodies[1] = `<< /Type /Pages /Kids [${kids.join(" ")}] /Count ${pages.length} >>`;

  let out = "%PDF-1.4\n";
  const offsets: number[] = [];
  bodies.forEach((body, i) => {
    offsets.push(out.length);
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefAt = out.length;
  out += `xref\n0 ${bodies.length + 1}\n0000000000 65535 f \n`;
  out += offsets.map((offset) => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  out += `trailer\n<< /Size ${bodies.length + 1} /Root 1 0 R >>\nstartxref\n${xrefAt}\n%%EOF\n`;
  return encode(out);
}
