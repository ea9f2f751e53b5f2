import path from "node:path";
import { describe, it, expect } from "vitest";
import {
  EMPTY_LIST_TEXT,
  layoutShoppingList,
  renderShoppingListPdf,
  shoppingListFilename,
} from "../../../src/lib/pdf";
import type { ShoppingListLine } from "../../../src/types";

const items = (count: number): ShoppingListLine[] =>
  Array.from({ length: count }, (_, i) => ({
    name: `item${String(i).padStart(3, "0")}`,
    measurementUnit: "g",
    totalAmount: i + 1,
  }));

const LATO = path.join(__dirname, "../../fixtures/fonts/Lato-Regular.ttf");

const pageCount = (pdf: Buffer) => (pdf.toString("latin1").match(/\/Type \/Page\b/g) ?? []).length;

describe("layoutShoppingList", () => {
  it("writes the header and an empty notice for an empty list", () => {
    expect(layoutShoppingList("alice", [])).toEqual([
      [
        { text: "Shopping list for alice", y: 40 },
        { text: EMPTY_LIST_TEXT, y: 60 },
      ],
    ]);
  });

  it("fits 35 entries under the header on the first page", () => {
    const pages = layoutShoppingList("alice", items(35));
    expect(pages).toHaveLength(1);
    expect(pages[0]).toHaveLength(36);
    expect(pages[0][1]).toEqual({ text: "item000: 1 g", y: 60 });
    expect(pages[0][35]).toEqual({ text: "item034: 35 g", y: 740 });
  });

  it("moves the 36th entry to the top of a second page", () => {
    const pages = layoutShoppingList("alice", items(36));
    expect(pages).toHaveLength(2);
    expect(pages[1]).toEqual([{ text: "item035: 36 g", y: 40 }]);
  });

  it("holds 36 entries on later pages", () => {
    expect(layoutShoppingList("alice", items(71))).toHaveLength(2);
    const pages = layoutShoppingList("alice", items(72));
    expect(pages).toHaveLength(3);
    expect(pages[1]).toHaveLength(36);
    expect(pages[2]).toEqual([{ text: "item071: 72 g", y: 40 }]);
  });

  it("keeps every line above the bottom margin", () => {
    const ys = layoutShoppingList("alice", items(100)).flat().map((l) => l.y);
    expect(Math.max(...ys)).toBe(740);
  });
});

describe("renderShoppingListPdf", () => {
  it("produces a one page document for an empty list", async () => {
    const pdf = await renderShoppingListPdf("alice", []);
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pageCount(pdf)).toBe(1);
  });

  it("embeds no font file by default", async () => {
    const pdf = await renderShoppingListPdf("alice", []);
    expect(pdf.toString("latin1")).not.toContain("/FontFile2");
  });

  it("embeds the configured TrueType font", async () => {
    const pdf = await renderShoppingListPdf("zoë", [{ name: "crème fraîche", measurementUnit: "g", totalAmount: 200 }], {
      fontPath: LATO,
    });
    expect(pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(pdf.toString("latin1")).toContain("/FontFile2");
  });

  it("fails when the configured font is missing", async () => {
    await expect(
      renderShoppingListPdf("alice", [], { fontPath: path.join(__dirname, "missing.ttf") })
    ).rejects.toThrow();
  });

  it("adds a page when the list overflows", async () => {
    const pdf = await renderShoppingListPdf("alice", items(36));
    expect(pageCount(pdf)).toBe(2);
  });
});

describe("shoppingListFilename", () => {
  it("names the file after the user", () => {
    expect(shoppingListFilename("alice")).toBe("shopping_cart_alice.pdf");
  });
});
