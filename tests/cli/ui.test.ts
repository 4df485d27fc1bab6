import { describe, expect, test } from "vitest";
import {
  color,
  escapeCsv,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  truncateStart,
  ui,
  VERSION,
} from "../../src/cli/ui/index.js";

describe("CLI UI utilities", () => {
  describe("ui object", () => {
    test("has the methods the commands use", () => {
      for (const method of [
        ui.intro,
        ui.outro,
        ui.cancel,
        ui.note,
        ui.info,
        ui.success,
        ui.warn,
        ui.error,
        ui.step,
        ui.message,
        ui.spinner,
        ui.confirmDeletion,
        ui.selectArchive,
      ]) {
        expect(typeof method).toBe("function");
      }
    });
  });

  test("VERSION is read from package.json", () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });

  describe("formatSummary", () => {
    test("aligns labels to the longest one", () => {
      const result = formatSummary([
        { label: "Short", value: "a" },
        { label: "Much Longer", value: "b" },
      ]);
      expect(result).toBe(
        `${color.dim("Short      ")}  a\n${color.dim("Much Longer")}  b`,
      );
    });

    test("filters out null and undefined values", () => {
      const result = formatSummary([
        { label: "Present", value: "yes" },
        { label: "Missing", value: null },
        { label: "Undefined", value: undefined },
      ]);
      expect(result).toBe(`${color.dim("Present  ")}  yes`);
    });

    test("keeps zero", () => {
      expect(formatSummary([{ label: "Deleted", value: 0 }])).toBe(`${color.dim("Deleted")}  0`);
    });

    test("handles empty array", () => {
      expect(formatSummary([])).toBe("");
    });
  });

  describe("formatTableRow", () => {
    test("pads columns and joins with a separator", () => {
      expect(formatTableRow(["A", "B"], [5, 5])).toBe(`A    ${color.dim(" │ ")}B    `);
    });

    test("lets long values overflow", () => {
      expect(formatTableRow(["VeryLongValue"], [5])).toBe("VeryLongValue");
    });
  });

  describe("formatTableSeparator", () => {
    test("joins column rules with intersections", () => {
      expect(formatTableSeparator([2, 3])).toBe(color.dim("──" + "─┼─" + "───"));
    });

    test("single column has no intersection", () => {
      expect(formatTableSeparator([4])).toBe(color.dim("────"));
    });
  });

  describe("truncateStart", () => {
    test("leaves short values alone", () => {
      expect(truncateStart("/a/b", 10)).toBe("/a/b");
    });

    test("keeps the tail of long values", () => {
      expect(truncateStart("/very/long/path/file.txt", 10)).toBe("…/file.txt");
    });
  });

  describe("formatTimestamp", () => {
    test("formats local date and time", () => {
      expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04:05");
    });
  });

  describe("escapeCsv", () => {
    test("passes plain values through", () => {
      expect(escapeCsv("/data/file.txt")).toBe("/data/file.txt");
    });

    test("quotes values with commas", () => {
      expect(escapeCsv("a,b")).toBe('"a,b"');
    });

    test("doubles embedded quotes", () => {
      expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    });
  });
});
