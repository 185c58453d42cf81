import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { CostPoint, ModeKind } from '../types';
import { currencySymbol, formatCostTooltip, formatTick } from '../services/analytics/format';

interface CostTrendChartProps {
  series: CostPoint[];
  period: ModeKind;
  currency: string;
  pricePerKwh: number;
  onSelectPoint?: (index: number) => void;
  emptyText?: string;
}

interface CostTooltipProps {
  active?: boolean;
  payload?: Array<{ value?: number | string | Array<number | string> }>;
  label?: number | string;
  currency: string;
  pricePerKwh: number;
}

export const CostTooltip: React.FC<CostTooltipProps> = ({ active, payload, label, currency, pricePerKwh }) => {
  if (!active || !payload || !payload.length) return null;
  const cost = Number(payload[0].value ?? 0);
  const when = typeof label === 'number' ? new Date(label).toLocaleString() : '';

  return (
    <div className="bg-slate-900 border border-slate-600 p-3 rounded-lg shadow-2xl antialiased text-xs">
      <p className="text-slate-400 font-semibold mb-1 border-b border-slate-700 pb-1 tracking-wide">{when}</p>
      <p className="text-slate-100 font-mono font-bold">{formatCostTooltip(cost, currency, pricePerKwh)}</p>
    </div>
  );
};

const CostTrendChart: React.FC<CostTrendChartProps> = ({
  series,
  period,
  currency,
  pricePerKwh,
  onSelectPoint,
  emptyText = 'No energy data for this period.'
}) => {
  if (series.length === 0) {
    return <div className="flex items-center justify-center h-full text-slate-500">{emptyText}</div>;
  }

  const data = series.map(([ts, cost]) => ({ ts, cost }));

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart
        data={data}
        margin={{ top: 10, right: 20, left: 0, bottom: 10 }}
        onClick={(state) => {
          if (onSelectPoint && typeof state?.activeTooltipIndex === 'number') onSelectPoint(state.activeTooltipIndex);
        }}
      >
        <CartesianGrid strokeDasharray="3 3" stroke="#334155" vertical={false} />
        <XAxis dataKey="ts" tickFormatter={(ts: number) => formatTick(ts, period)} stroke="#94a3b8" fontSize={11} tickLine={false} minTickGap={30} dy={10} />
        <YAxis
          stroke="#94a3b8"
          fontSize={11}
          tickLine={false}
          tickFormatter={(v: number) => `${currencySymbol(currency)}${v.toFixed(2)}`}
        />
        <Tooltip
          content={<CostTooltip currency={currency} pricePerKwh={pricePerKwh} />}
          cursor={{ fill: '#334155', opacity: 0.4 }}
          isAnimationActive={false}
        />
        <Bar dataKey="cost" fill="#10B981" radius={[4, 4, 0, 0]} cursor={onSelectPoint ? 'pointer' : undefined} />
      </BarChart>
    </ResponsiveContainer>
  );
};

export default CostTrendChart;
