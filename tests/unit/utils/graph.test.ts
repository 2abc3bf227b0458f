import { describe, it, expect } from 'vitest';
import { renderBarChart } from '../../../src/utils/graph.js';

describe('renderBarChart', () => {
  it('scales bars to the largest value', () => {
    const chart = renderBarChart(
      'Monthly spending: Groceries',
      [
        { label: '2024-01', value: 50000 },
        { label: '2024-02', value: 0 },
        { label: '2024-03', value: 25000 },
      ],
      10
    );

    expect(chart.split('\n')).toEqual([
      'Monthly spending: Groceries',
      '2024-01 | ██████████ $50.00',
      '2024-02 | $0.00',
      '2024-03 | █████ $25.00',
    ]);
  });

  it('pads labels to the widest one', () => {
    const chart = renderBarChart(
      'Yearly',
      [
        { label: 'a', value: 1000 },
        { label: 'abc', value: 1000 },
      ],
      4
    );

    expect(chart.split('\n')).toEqual(['Yearly', 'a   | ████ $1.00', 'abc | ████ $1.00']);
  });

  it('uses the magnitude of negative values', () => {
    const chart = renderBarChart('Net', [{ label: 'x', value: -2000 }], 2);

    expect(chart.split('\n')[1]).toBe('x | ██ -$2.00');
  });

  it('notes an empty series', () => {
    expect(renderBarChart('Empty', [])).toBe('Empty\n(no data)');
  });
});
