import { stripVTControlCharacters } from "node:util";

export interface TableOptions {
    maxColWidth?: number; // max column width before truncation (default: 50)
    /** Styles the header row and separator, e.g. chalk.bold */
    headerStyle?: (text: string) => string;
}

/** Printable width of a cell, ignoring ANSI color codes */
export function visibleLength(value: string): number {
    return stripVTControlCharacters(value).length;
}

function truncateCell(value: string, maxWidth: number): string {
    const plain = stripVTControlCharacters(value);
    if (plain.length <= maxWidth) return value;
    // Colored cells lose their styling when cut; the plain text is what matters
    return `${plain.slice(0, maxWidth - 3)}...`;
}

/**
 * Aligned plain-text table with a ─ separator under the headers.
 * Cells may carry ANSI colors; widths are measured on the visible text.
 */
export function formatTable(rows: string[][], headers: string[], options?: TableOptions): string {
    const maxColWidth = options?.maxColWidth ?? 50;
    const headerStyle = options?.headerStyle ?? ((text: string) => text);

    const colWidths = headers.map((h) => Math.min(h.length, maxColWidth));
    for (const row of rows) {
        row.forEach((cell, i) => {
            const cellLen = Math.min(visibleLength(cell), maxColWidth);
            if (colWidths[i] === undefined || cellLen > colWidths[i]) {
                colWidths[i] = cellLen;
            }
        });
    }

    function padCell(value: string, colIndex: number): string {
        const truncated = truncateCell(value, maxColWidth);
        const padding = " ".repeat(Math.max(0, colWidths[colIndex] - visibleLength(truncated)));
        return truncated + padding;
    }

    const headerLine = headerStyle(headers.map((h, i) => padCell(h, i)).join("  ").trimEnd());
    const separatorLine = headerStyle(colWidths.map((w) => "─".repeat(w)).join("  "));
    const dataLines = rows.map((row) =>
        row
            .map((cell, i) => padCell(cell, i))
            .join("  ")
            .trimEnd()
    );

    return [headerLine, separatorLine, ...dataLines].join("\n");
}
