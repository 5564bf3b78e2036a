import CodeBlockWriter from "code-block-writer";

/**
 * Create a writer for generated Go source.
 * Go indents with tabs; callers write the tabs themselves so that user text
 * (comments, struct tags) never affects indentation tracking.
 */
export function createWriter(): CodeBlockWriter {
  return new CodeBlockWriter({
    newLine: "\n",
    useTabs: true,
  });
}

/** Width in code points, which is how gofmt measures a cell */
function width(cell: string): number {
  return [...cell].length;
}

/**
 * Pad every column but the last to a shared width, separated by one space
 * (the layout gofmt gives struct fields)
 */
export function alignColumns(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, width(cell));
    });
  }

  return rows.map((row) =>
    row
      .map((cell, index) =>
        index === row.length - 1
          ? cell
          : cell + " ".repeat((widths[index] ?? 0) - width(cell)),
      )
      .join(" "),
  );
}
