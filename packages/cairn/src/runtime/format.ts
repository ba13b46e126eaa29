import type { Row } from '../common/types.js';

/**
 * Renders a fixed-width text table:
 *
 * ```
 * id | name
 * ---+------
 * 1  | Alice
 * (1 row)
 * ```
 *
 * Every cell is left-aligned and padded to its column's width, including the last.
 * Width is measured in UTF-16 code units.
 */
export function formatResultTable(headers: readonly string[], rows: readonly Row[]): string {
	if (headers.length === 0) {
		return '(no columns)\n';
	}

	const widths = headers.map(h => h.length);
	for (const row of rows) {
		row.forEach((cell, i) => {
			if (i < widths.length) {
				widths[i] = Math.max(widths[i], cell.length);
			}
		});
	}

	const line = (cells: readonly string[]): string =>
		cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | ') + '\n';

	let out = line(headers);
	out += widths.map(w => '-'.repeat(w)).join('-+-') + '\n';
	for (const row of rows) {
		out += line(row);
	}
	out += `(${rows.length} ${rows.length === 1 ? 'row' : 'rows'})\n`;
	return out;
}
