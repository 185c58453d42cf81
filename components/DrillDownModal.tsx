import React, { useEffect } from 'react';
import { X, Loader2 } from 'lucide-react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer } from 'recharts';
import type { DrillDownView } from '../services/analytics/EnergyAnalyticsController';
import { formatDetailTooltip } from '../services/analytics/format';

interface DrillDownModalProps {
  view: DrillDownView;
  currency: string;
  pricePerKwh: number;
  onSelectPoint: (index: number) => void;
  onClose: () => void;
}

interface DetailTooltipProps {
  active?: boolean;
  payload?: Array<{ value?: number | string | Array<number | string> }>;
  label?: number | string;
  currency: string;
  pricePerKwh: number;
}

const DetailTooltip: React.FC<DetailTooltipProps> = ({ active, payload, label, currency, pricePerKwh }) => {
  if (!active || !payload || !payload.length) return null;
  const cost = Number(payload[0].value ?? 0);
  return (
    <div className="bg-slate-900 border border-slate-600 p-3 rounded-lg shadow-2xl text-xs">
      {typeof label === 'number' && <p className="text-slate-400 mb-1">{new Date(label).toLocaleTimeString()}</p>}
      <p className="text-slate-100 font-mono font-bold">{formatDetailTooltip(cost, currency, pricePerKwh)}</p>
    </div>
  );
};

const DrillDownModal: React.FC<DrillDownModalProps> = ({ view, currency, pricePerKwh, onSelectPoint, onClose }) => {
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') onClose();
    };
    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, [onClose]);

  if (!view.open) return null;

  const minuteLevel = view.context?.granularity === 'minute';
  const data = view.series.map(([ts, cost]) => ({ ts, cost }));
  const tickFormat = (ts: number) =>
    new Date(ts).toLocaleTimeString([], minuteLevel ? { hour: '2-digit', minute: '2-digit' } : { hour: '2-digit' });

  return (
    <div className="fixed inset-0 z-[100] flex items-center justify-center bg-black/70 backdrop-blur-sm p-4">
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="drill-down-title"
        className="bg-slate-800 rounded-2xl border border-slate-700 w-full max-w-4xl shadow-2xl overflow-hidden flex flex-col max-h-[90vh]"
      >
        <div className="p-6 border-b border-slate-700 flex justify-between items-center bg-slate-900/50">
          <h2 id="drill-down-title" className="text-xl font-bold text-white">{view.title}</h2>
          <button aria-label="Close detail" onClick={onClose} className="text-slate-400 hover:text-white">
            <X size={24} />
          </button>
        </div>

        <div className="p-6 h-[400px]">
          {view.loading ? (
            <div className="flex items-center justify-center h-full gap-2 text-slate-500">
              <Loader2 className="animate-spin" size={20} /> Loading detail...
            </div>
          ) : data.length === 0 ? (
            <div className="flex items-center justify-center h-full text-slate-500">No detailed data for this period.</div>
          ) : (
            <ResponsiveContainer width="100%" height="100%">
              <BarChart
                data={data}
                margin={{ top: 10, right: 20, left: 0, bottom: 10 }}
                onClick={(state) => {
                  if (!minuteLevel && typeof state?.activeTooltipIndex === 'number') onSelectPoint(state.activeTooltipIndex);
                }}
              >
                <CartesianGrid strokeDasharray="3 3" stroke="#334155" vertical={false} />
                <XAxis dataKey="ts" tickFormatter={tickFormat} stroke="#94a3b8" fontSize={11} tickLine={false} minTickGap={20} />
                <YAxis stroke="#94a3b8" fontSize={11} tickLine={false} />
                <Tooltip content={<DetailTooltip currency={currency} pricePerKwh={pricePerKwh} />} isAnimationActive={false} />
                <Bar dataKey="cost" fill="#10B981" radius={[3, 3, 0, 0]} cursor={minuteLevel ? undefined : 'pointer'} />
              </BarChart>
            </ResponsiveContainer>
          )}
        </div>
        {!minuteLevel && data.length > 0 && !view.loading && (
          <p className="px-6 pb-4 text-xs text-slate-500">Select an hour to see its minutes.</p>
        )}
      </div>
    </div>
  );
};

export default DrillDownModal;
