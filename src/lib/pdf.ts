import PDFDocument from "pdfkit";
import type { ShoppingListLine } from "../types";
import { formatLine } from "./shoppingList";

// US Letter, measured in points from the top-left corner.
export const PAGE_HEIGHT = 792;
export const LEFT_MARGIN = 100;
export const TOP_MARGIN = 40;
export const BOTTOM_MARGIN = 40;
export const LINE_HEIGHT = 20;
export const FONT_SIZE = 12;
const FONT = "Helvetica";

export type PlacedLine = { text: string; y: number };

export const EMPTY_LIST_TEXT = "Your shopping list is empty.";
export const headerText = (username: string) => `Shopping list for ${username}`;

/**
 * Splits the list into pages of positioned lines. A page breaks once the
 * cursor passes the bottom margin; a page is only opened when a line needs it.
 */
export const layoutShoppingList = (username: string, lines: ShoppingListLine[]): PlacedLine[][] => {
  const pages: PlacedLine[][] = [[{ text: headerText(username), y: TOP_MARGIN }]];
  let page = pages[0];
  let y = TOP_MARGIN + LINE_HEIGHT;

  if (lines.length === 0) {
    page.push({ text: EMPTY_LIST_TEXT, y });
    return pages;
  }

  for (const line of lines) {
    if (y > PAGE_HEIGHT - BOTTOM_MARGIN) {
      page = [];
      pages.push(page);
      y = TOP_MARGIN;
    }
    page.push({ text: formatLine(line), y });
    y += LINE_HEIGHT;
  }
  return pages;
};

export type PdfOptions = {
  /** TrueType font to embed; the standard Helvetica only covers WinAnsi text. */
  fontPath?: string;
};

const EMBEDDED_FONT = "ListFont";

export const renderShoppingListPdf = (
  username: string,
  lines: ShoppingListLine[],
  { fontPath }: PdfOptions = {}
): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: "LETTER", margin: 0, autoFirstPage: false });
    const chunks: Buffer[] = [];
    doc.on("data", (chunk: Buffer) => chunks.push(chunk));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    if (fontPath) doc.registerFont(EMBEDDED_FONT, fontPath);
    const font = fontPath ? EMBEDDED_FONT : FONT;
    for (const page of layoutShoppingList(username, lines)) {
      doc.addPage({ size: "LETTER", margin: 0 });
      doc.font(font).fontSize(FONT_SIZE);
      for (const line of page) {
        doc.text(line.text, LEFT_MARGIN, line.y, { lineBreak: false });
      }
    }
    doc.end();
  });

export const shoppingListFilename = (username: string) => `shopping_cart_${username}.pdf`;
