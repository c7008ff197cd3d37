import { readFile } from "node:fs/promises";
import path from "node:path";
import { jsPDF } from "jspdf";
import { env } from "../config/env.js";
import type { ShoppingListRow } from "./shopping-list.js";

/** A TrueType font embedded in place of the built-in Helvetica, which only covers Latin-1. */
export type PdfFont = {
  name: string;
  data: string;
};

const COLORS = {
  accent: "#4A90D9",
  muted: "#666666",
  rule: "#E0E0E0",
  stripe: "#F5F5F5",
  text: "#333333",
  footer: "#999999",
};

const MARGIN = 50;
const ROW_HEIGHT = 30;
const PAGE_BOTTOM_LIMIT = 80;
const FOOTER_TEXT = "Forkful shopping list";

const capitalize = (value: string) => (value ? value[0].toUpperCase() + value.slice(1) : value);

export const formatAmount = (row: ShoppingListRow) => `${row.totalAmount} ${row.measurementUnit}`;

const formatDate = (date: Date) =>
  [String(date.getDate()).padStart(2, "0"), String(date.getMonth() + 1).padStart(2, "0"), date.getFullYear()].join(".");

export const loadPdfFont = async (fontPath = env.PDF_FONT_PATH): Promise<PdfFont | undefined> => {
  if (!fontPath) {
    return undefined;
  }

  const data = await readFile(fontPath);
  return { name: path.basename(fontPath, path.extname(fontPath)), data: data.toString("base64") };
};

/** Lays out aggregated rows as an A4 PDF. An empty list still yields a complete document. */
export const renderShoppingListPdf = (payload: {
  rows: ShoppingListRow[];
  username: string;
  generatedAt?: Date;
  font?: PdfFont;
}): Buffer => {
  const doc = new jsPDF({ unit: "pt", format: "a4" });
  const { font } = payload;
  if (font) {
    doc.addFileToVFS(`${font.name}.ttf`, font.data);
    doc.addFont(`${font.name}.ttf`, font.name, "normal");
  }
  // An embedded font is registered in one style only.
  const setWeight = (weight: "normal" | "bold") => {
    doc.setFont(font ? font.name : "helvetica", font ? "normal" : weight);
  };
  const width = doc.internal.pageSize.getWidth();
  const height = doc.internal.pageSize.getHeight();

  const drawFooter = () => {
    doc.setTextColor(COLORS.footer);
    setWeight("normal");
    doc.setFontSize(9);
    doc.text(FOOTER_TEXT, width / 2, height - 30, { align: "center" });
  };

  doc.setFillColor(COLORS.accent);
  doc.rect(0, 0, width, 80, "F");
  doc.setTextColor("#FFFFFF");
  setWeight("bold");
  doc.setFontSize(28);
  doc.text("Shopping list", width / 2, 50, { align: "center" });

  doc.setTextColor(COLORS.muted);
  setWeight("normal");
  doc.setFontSize(10);
  doc.text(`Date: ${formatDate(payload.generatedAt ?? new Date())}`, MARGIN, 110);
  doc.text(`User: ${payload.username}`, MARGIN, 125);

  doc.setDrawColor(COLORS.rule);
  doc.setLineWidth(1);
  doc.line(MARGIN, 140, width - MARGIN, 140);

  let y = 170;
  payload.rows.forEach((row, index) => {
    const position = index + 1;

    if (position % 2 === 0) {
      doc.setFillColor(COLORS.stripe);
      doc.rect(MARGIN, y - 20, width - MARGIN * 2, ROW_HEIGHT, "F");
    }

    doc.setTextColor(COLORS.accent);
    setWeight("bold");
    doc.setFontSize(12);
    doc.text(`${position}.`, MARGIN + 10, y);

    doc.setTextColor(COLORS.text);
    setWeight("normal");
    doc.text(capitalize(row.name), MARGIN + 40, y);

    setWeight("bold");
    doc.text(formatAmount(row), width - MARGIN - 10, y, { align: "right" });

    y += ROW_HEIGHT;

    if (y > height - PAGE_BOTTOM_LIMIT) {
      drawFooter();
      doc.addPage();
      y = 50;
    }
  });

  doc.setDrawColor(COLORS.accent);
  doc.setLineWidth(2);
  doc.line(MARGIN, y - 10, width - MARGIN, y - 10);

  doc.setTextColor(COLORS.text);
  setWeight("bold");
  doc.setFontSize(14);
  doc.text(`Items: ${payload.rows.length}`, MARGIN + 10, y + 15);

  drawFooter();

  return Buffer.from(doc.output("arraybuffer"));
};
