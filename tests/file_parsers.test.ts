import { describe, expect, it } from "vitest";
import ExcelJS from "exceljs";

import { UnsupportedFileError } from "../src/lib/skills_audit/errors";
import { parseCsvText, parseFile } from "../src/lib/skills_audit/file_parsers";

async function buildXlsx(rows: Array<Array<string | number | null>>) {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Responses");
  for (const row of rows) {
    sheet.addRow(row);
  }
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe("file_parsers", () => {
  it("parses CSV with a BOM, quotes and blank lines", () => {
    const table = parseCsvText(
      "self.csv",
      '\uFEFFEmployee Name , Communication\n"Smith, Alice",4\n\n,\nBob,3,extra\nCarol\n'
    );
    expect(table).toEqual({
      filename: "self.csv",
      headers: ["Employee Name", "Communication"],
      rows: [
        ["Smith, Alice", "4"],
        ["Bob", "3"],
        ["Carol", ""],
      ],
    });
  });

  it("returns an empty table for an empty CSV", () => {
    expect(parseCsvText("empty.csv", "")).toEqual({ filename: "empty.csv", headers: [], rows: [] });
  });

  it("reads the first sheet of an xlsx upload", async () => {
    const buffer = await buildXlsx([
      ["Employee Name", "Communication", "Leadership"],
      ["Alice", 4, null],
      [null, null, null],
      ["Bob", 3.5, 2],
    ]);
    const table = await parseFile("self.xlsx", buffer);
    expect(table).toEqual({
      filename: "self.xlsx",
      headers: ["Employee Name", "Communication", "Leadership"],
      rows: [
        ["Alice", "4", ""],
        ["Bob", "3.5", "2"],
      ],
    });
  });

  it("dispatches CSV by extension", async () => {
    const table = await parseFile("SELF.CSV", Buffer.from("Name,Communication\nAlice,4\n"));
    expect(table.rows).toEqual([["Alice", "4"]]);
  });

  it("rejects legacy and unknown formats", async () => {
    await expect(parseFile("self.xls", Buffer.from(""))).rejects.toThrow(UnsupportedFileError);
    await expect(parseFile("self.xls", Buffer.from(""))).rejects.toThrow(
      "XLS files are not supported. Please save as .xlsx."
    );
    await expect(parseFile("notes.txt", Buffer.from(""))).rejects.toThrow("Unsupported file type: .txt");
    await expect(parseFile("README", Buffer.from(""))).rejects.toThrow("Unsupported file type: (none)");
  });
});
