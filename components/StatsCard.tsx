import React from 'react';
import { ArrowUpRight, ArrowDownRight, Minus } from 'lucide-react';
import { formatTrend, trendDirection } from '../services/analytics/format';

interface StatsCardProps {
  title: string;
  value: string;
  icon: React.ReactNode;
  subValue?: string;
  highlight?: boolean;
  valueColor?: string;
  // Percent change against the previous period of the same length.
  trend?: number;
}

const StatsCard: React.FC<StatsCardProps> = ({
  title,
  value,
  icon,
  subValue,
  highlight = false,
  valueColor,
  trend
}) => {
  const direction = trend !== undefined ? trendDirection(trend) : null;

  return (
    <div className={`p-6 rounded-2xl border transition-all duration-300 relative overflow-hidden group ${
      highlight
        ? 'bg-slate-800/80 border-emerald-500/50 shadow-[0_0_20px_rgba(16,185,129,0.15)]'
        : 'bg-slate-800/60 border-slate-700/60 shadow-lg hover:border-slate-600'
    }`}>
      <div className="absolute inset-0 bg-gradient-to-br from-white/5 to-transparent opacity-0 group-hover:opacity-100 transition-opacity duration-500 pointer-events-none" />

      <div className="flex justify-between items-start mb-4 relative z-10">
        <p className="text-slate-400 text-sm font-medium tracking-wide">{title}</p>
        <div className={`p-2 rounded-xl backdrop-blur-md ${highlight ? 'bg-emerald-500/10 text-emerald-400' : 'bg-slate-700/50 text-slate-300'}`}>
          {icon}
        </div>
      </div>

      <h3 className={`text-3xl font-bold tracking-tight relative z-10 ${valueColor ? valueColor : 'text-slate-100'}`}>
        {value}
      </h3>

      {trend !== undefined && direction && (
        <div data-testid="stats-trend" data-direction={direction} className="flex items-center gap-1 mt-2 text-xs relative z-10">
          {direction === 'up' && <ArrowUpRight className="text-red-400" size={14} />}
          {direction === 'down' && <ArrowDownRight className="text-emerald-400" size={14} />}
          {direction === 'neutral' && <Minus className="text-slate-500" size={14} />}
          <span className="text-slate-400">{formatTrend(trend)}</span>
        </div>
      )}

      {subValue && (
        <p className="text-sm text-slate-500 mt-2 font-medium relative z-10">
          {subValue}
        </p>
      )}
    </div>
  );
};

export default StatsCard;
