/**
 * Terminal Bar Charts
 *
 * Renders a monthly or yearly series as fixed-width text so MCP clients
 * can show it without any image support.
 */

import { formatCurrency } from './milliunits.js';

export interface BarDatum {
  label: string;
  /** Value in milliunits */
  value: number;
}

const BAR_CHAR = '█';

/**
 * Render one horizontal bar per datum, scaled so the largest absolute
 * value spans `width` characters.
 */
export function renderBarChart(title: string, data: BarDatum[], width = 40): string {
  const lines = [title];
  if (data.length === 0) {
    lines.push('(no data)');
    return lines.join('\n');
  }

  const max = Math.max(...data.map((d) => Math.abs(d.value)));
  const labelWidth = Math.max(...data.map((d) => d.label.length));

  for (const datum of data) {
    const length = max > 0 ? Math.round((Math.abs(datum.value) / max) * width) : 0;
    const bar = BAR_CHAR.repeat(length);
    const amount = formatCurrency(datum.value);
    lines.push(`${datum.label.padEnd(labelWidth)} | ${bar}${bar.length > 0 ? ' ' : ''}${amount}`);
  }

  return lines.join('\n');
}
