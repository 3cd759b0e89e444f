import { emitReport, type DocumentBuilder, type IssueReport } from "@issueroll/core";

const MAX_HEADER_LEVEL = 6;

export function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(" | ")} |`;
}

/** Accumulates ATX headers, paragraphs and left-aligned pipe tables. */
export class MarkdownDocument implements DocumentBuilder {
  private readonly lines: string[] = [];

  header(level: number, text: string): void {
    const depth = Math.min(Math.max(Math.trunc(level), 1), MAX_HEADER_LEVEL);
    this.separate();
    this.lines.push(`${"#".repeat(depth)} ${text}`, "");
  }

  line(text = ""): void {
    this.lines.push(text);
  }

  table(columns: string[], rows: string[][]): void {
    this.separate();
    this.lines.push(tableRow(columns.map(escapeCell)));
    this.lines.push(tableRow(columns.map(() => ":---")));
    for (const row of rows) {
      // Short rows are padded, long rows cut to the column count.
      const cells = columns.map((_, index) => escapeCell(row[index] ?? ""));
      this.lines.push(tableRow(cells));
    }
    this.lines.push("");
  }

  toString(): string {
    const body = this.lines.join("\n").replace(/\n{3,}/g, "\n\n").trim();
    return body ? `${body}\n` : "";
  }

  private separate(): void {
    const last = this.lines[this.lines.length - 1];
    if (last !== undefined && last !== "") {
      this.lines.push("");
    }
  }
}

export function renderMarkdownReport(report: Pick<IssueReport, "blocks">): string {
  const document = new MarkdownDocument();
  emitReport(report.blocks, document);
  return document.toString();
}
