import { describe, it, expect } from 'vitest';
import { extractSvg, renderSessionChart } from './render-chart';
import { aggregate } from '../engine/session-aggregator';
import { fixtureHands } from '../../test/fixtures';

describe('extractSvg', () => {
  it('keeps only the svg element', () => {
    expect(extractSvg('<div class="wrapper"><svg a="1"><g></g></svg></div>')).toBe('<svg a="1"><g></g></svg>');
  });

  it('throws when there is no svg', () => {
    expect(() => extractSvg('<div></div>')).toThrow('[ChartRenderer] Chart markup contains no svg element');
  });
});

describe('renderSessionChart', () => {
  const series = aggregate(fixtureHands('888_poker_hand_history_1.txt'), 'superpippa69');

  it('renders a standalone titled svg document', () => {
    const svg = renderSessionChart(series, { width: 800, height: 400 });
    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="800" height="448"')).toBe(true);
    expect(svg).toContain('>Session results (2020-05-15)</text>');
    expect(svg).toContain('recharts-surface');
    expect(svg.endsWith('</svg>\n')).toBe(true);
  });
});
