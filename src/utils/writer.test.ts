import { describe, expect, it } from "vitest";

import { alignColumns, createWriter } from "./writer";

describe("alignColumns", () => {
  it("pads every column but the last to its widest cell", () => {
    expect(
      alignColumns([
        ["ID", "string", "`a`"],
        ["Name", "int", "`b`"],
      ]),
    ).toEqual(["ID   string `a`", "Name int    `b`"]);
  });

  it("measures cells in code points", () => {
    expect(
      alignColumns([
        ["\u{1D49C}", "string", "`a`"],
        ["Bb", "int", "`b`"],
      ]),
    ).toEqual(["\u{1D49C}  string `a`", "Bb int    `b`"]);
  });

  it("returns no lines for no rows", () => {
    expect(alignColumns([])).toEqual([]);
  });
});

describe("createWriter", () => {
  it("writes lines separated by newlines", () => {
    const writer = createWriter();
    writer.writeLine("package main");
    writer.blankLine();
    writer.writeLine("type Schema string");

    expect(writer.toString()).toBe("package main\n\ntype Schema string\n");
  });
});
