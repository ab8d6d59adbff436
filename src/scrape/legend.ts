/**
 * legend.ts
 *
 * Parses the course legend table (#myTable): one row per enrolled course,
 * cell 0 = course code, cell 1 = English name <br> Thai name.
 */

import { cellLines, cellText } from './markup';
import type { LegendMap } from './types';

// Rows with fewer than two cells or an empty code are skipped.
// A code seen twice keeps the later row.
export function parseLegendRows(rows: string[][]): LegendMap {
  const legend: LegendMap = new Map();

  for (const cells of rows) {
    if (cells.length < 2) continue;

    const code = cellText(cells[0]).trim();
    if (!code) continue;

    const names = cellLines(cells[1]);
    legend.set(code, {
      code,
      name_en: names[0] ?? '',
      name_th: names[1] ?? '',
    });
  }

  return legend;
}
