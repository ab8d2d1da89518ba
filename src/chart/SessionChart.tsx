import { CartesianGrid, Line, LineChart, ReferenceLine, XAxis, YAxis } from 'recharts';
import type { ChartPoint } from './chart-data';
import { formatTick } from './chart-data';

interface SessionChartProps {
  points: ChartPoint[];
  width: number;
  height: number;
  currency?: string;
}

export default function SessionChart({ points, width, height, currency = '$' }: SessionChartProps) {
  return (
    <LineChart width={width} height={height} data={points} margin={{ top: 16, right: 32, bottom: 32, left: 32 }}>
      <CartesianGrid stroke="#e5e7eb" strokeDasharray="3 3" />
      <XAxis
        dataKey="time"
        type="number"
        scale="time"
        domain={['dataMin', 'dataMax']}
        tickFormatter={formatTick}
        label={{ value: 'Time (UTC)', position: 'insideBottom', offset: -16 }}
      />
      <YAxis
        tickFormatter={(value: number) => value.toFixed(2)}
        label={{ value: `Winnings / losses (in ${currency})`, angle: -90, position: 'insideLeft' }}
      />
      <ReferenceLine y={0} stroke="#6b7280" />
      <Line
        type="linear"
        dataKey="cumulative"
        stroke="#3b82f6"
        strokeWidth={2}
        dot={false}
        isAnimationActive={false}
      />
    </LineChart>
  );
}
