import React from 'react';
import { PieChart, Pie, Cell, ResponsiveContainer, Label } from 'recharts';
import type { DistributionView, PeriodLabel } from '../types';
import { PERIOD_LABELS } from '../services/analytics/bucketAggregator';
import { currencySymbol } from '../services/analytics/format';

const PERIOD_COLORS: Record<PeriodLabel, string> = {
  morning: '#FACC15',
  afternoon: '#F97316',
  evening: '#8B5CF6',
  night: '#3B82F6',
};

interface UsagePatternDonutProps {
  distribution: DistributionView;
  currency: string;
}

const UsagePatternDonut: React.FC<UsagePatternDonutProps> = ({ distribution, currency }) => {
  const symbol = currencySymbol(currency);
  const data = distribution.buckets.map((b) => ({ name: PERIOD_LABELS[b.periodLabel], period: b.periodLabel, value: b.costValue }));
  // An all-zero pie renders nothing; keep an empty ring visible instead.
  const hasData = distribution.total > 0;

  return (
    <div className="w-full h-full flex flex-col">
      <div className="flex-1 min-h-0 relative">
        <ResponsiveContainer width="100%" height="100%">
          <PieChart>
            <Pie
              data={hasData ? data : [{ name: 'empty', period: 'night', value: 1 }]}
              cx="50%"
              cy="50%"
              innerRadius="65%"
              outerRadius="90%"
              dataKey="value"
              stroke="none"
              paddingAngle={hasData ? 3 : 0}
              isAnimationActive={false}
            >
              {hasData
                ? data.map((d) => <Cell key={d.period} fill={PERIOD_COLORS[d.period]} />)
                : <Cell key="empty" fill="#1e293b" />}
              <Label
                value={`${symbol}${distribution.total.toFixed(2)}`}
                position="center"
                className="font-bold fill-slate-100"
                style={{ fontSize: '1.1rem', fontWeight: 700 }}
              />
            </Pie>
          </PieChart>
        </ResponsiveContainer>
      </div>
      <ul className="grid grid-cols-2 gap-2 mt-4 text-xs">
        {distribution.buckets.map((b) => (
          <li key={b.periodLabel} className="flex items-center gap-2">
            <span className="w-3 h-3 rounded-full" style={{ backgroundColor: PERIOD_COLORS[b.periodLabel] }} />
            <span className="text-slate-400">{PERIOD_LABELS[b.periodLabel]}</span>
            <span className="ml-auto font-mono text-slate-200">{symbol}{b.costValue.toFixed(3)}</span>
          </li>
        ))}
      </ul>
    </div>
  );
};

export default UsagePatternDonut;
