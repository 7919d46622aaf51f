/**
 * Formatting utilities
 */

/**
 * Render rows as left-aligned columns under a dashed rule.
 * Trailing spaces are trimmed from every line.
 */
export function formatTable(header: readonly string[], rows: ReadonlyArray<readonly string[]>): string {
    const widths = header.map((h, i) =>
        Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));

    const line = (cells: readonly string[]) =>
        widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join('  ').trimEnd();

    const lines: string[] = [];
    lines.push(line(header));
    lines.push(widths.map(w => '-'.repeat(w)).join('  '));
    for (const row of rows) {
        lines.push(line(row));
    }
    return lines.join('\n');
}

/**
 * Numbered list, one item per line.
 */
export function formatNumbered(items: readonly string[]): string {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}
