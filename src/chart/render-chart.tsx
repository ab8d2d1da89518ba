import { renderToStaticMarkup } from 'react-dom/server';
import type { SessionSeries } from '../engine/types';
import SessionChart from './SessionChart';
import { chartTitle, toChartPoints } from './chart-data';

const TITLE_HEIGHT = 48;

export interface ChartOptions {
  width?: number;
  height?: number;
  currency?: string;
}

interface ChartFrameProps {
  title: string;
  width: number;
  height: number;
  chartSvg: string;
}

function ChartFrame({ title, width, height, chartSvg }: ChartFrameProps) {
  const totalHeight = height + TITLE_HEIGHT;
  return (
    <svg xmlns="http://www.w3.org/2000/svg" width={width} height={totalHeight} viewBox={`0 0 ${width} ${totalHeight}`}>
      <rect width={width} height={totalHeight} fill="#ffffff" />
      <text x={width / 2} y={30} textAnchor="middle" fontFamily="sans-serif" fontSize={20}>
        {title}
      </text>
      <g transform={`translate(0, ${TITLE_HEIGHT})`} dangerouslySetInnerHTML={{ __html: chartSvg }} />
    </svg>
  );
}

/** recharts wraps its surface in a div; keep only the svg element. */
export function extractSvg(markup: string): string {
  const start = markup.indexOf('<svg');
  const end = markup.lastIndexOf('</svg>');
  if (start === -1 || end === -1) {
    throw new Error('[ChartRenderer] Chart markup contains no svg element');
  }
  return markup.slice(start, end + '</svg>'.length);
}

/** Standalone SVG document plotting the cumulative result against time. */
export function renderSessionChart(series: SessionSeries, options: ChartOptions = {}): string {
  const { width = 1200, height = 600, currency = '$' } = options;

  const chartMarkup = renderToStaticMarkup(
    <SessionChart points={toChartPoints(series)} width={width} height={height} currency={currency} />,
  );
  const frame = renderToStaticMarkup(
    <ChartFrame title={chartTitle(series)} width={width} height={height} chartSvg={extractSvg(chartMarkup)} />,
  );
  return `<?xml version="1.0" encoding="UTF-8"?>\n${frame}\n`;
}
