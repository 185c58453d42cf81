import React from 'react';
import { AreaChart, Area, XAxis, YAxis, CartesianGrid, ResponsiveContainer } from 'recharts';
import type { StreamingChartAdapter } from '../services/charts/StreamingChartAdapter';
import { formatTick, currencySymbol } from '../services/analytics/format';
import { useChartSnapshot } from '../hooks/useEnergyAnalytics';

interface RealtimeCostChartProps {
  adapter: StreamingChartAdapter;
  currency: string;
}

const RealtimeCostChart: React.FC<RealtimeCostChartProps> = ({ adapter, currency }) => {
  const snapshot = useChartSnapshot(adapter);
  const symbol = currencySymbol(currency);

  return (
    <div className="w-full h-full" data-testid="realtime-chart" data-color={snapshot.borderColor}>
      <ResponsiveContainer width="100%" height="100%">
        <AreaChart data={snapshot.points} margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
          <defs>
            <linearGradient id="colorLive" x1="0" y1="0" x2="0" y2="1">
              <stop offset="5%" stopColor={snapshot.borderColor} stopOpacity={0.6} />
              <stop offset="95%" stopColor={snapshot.borderColor} stopOpacity={0} />
            </linearGradient>
          </defs>
          <CartesianGrid strokeDasharray="3 3" stroke="#334155" vertical={false} />
          <XAxis
            dataKey="x"
            type="number"
            domain={[snapshot.windowStart, snapshot.windowEnd]}
            allowDataOverflow
            tickFormatter={(ts: number) => formatTick(ts, 'realtime')}
            stroke="#94a3b8"
            fontSize={11}
            tickLine={false}
            minTickGap={40}
            dy={10}
          />
          <YAxis
            domain={[0, snapshot.yMax]}
            allowDataOverflow
            stroke="#94a3b8"
            fontSize={11}
            tickLine={false}
            tickFormatter={(v: number) => `${symbol}${v.toFixed(4)}`}
          />
          <Area
            type="monotone"
            dataKey="y"
            stroke={snapshot.borderColor}
            fill="url(#colorLive)"
            dot={false}
            isAnimationActive={false}
          />
        </AreaChart>
      </ResponsiveContainer>
    </div>
  );
};

export default RealtimeCostChart;
