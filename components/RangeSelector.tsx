import React, { useState } from 'react';
import { ArrowRight, Calendar, Clock, Radio } from 'lucide-react';
import type { ModeKind, ModeState } from '../types';
import { parseRefreshSeconds } from '../services/config';
import { realtimeMode, timeOfDay, yearMode } from '../services/analytics/timeRange';

interface RangeSelectorProps {
  mode: ModeState | null;
  availableYears: number[];
  now: number;
  onSelect: (mode: ModeState) => void;
}

const TABS: Array<{ kind: ModeKind; label: string }> = [
  { kind: 'realtime', label: 'Real Time' },
  { kind: 'today', label: 'Today' },
  { kind: 'day', label: 'Day' },
  { kind: 'range', label: 'Range' },
];

const isoDate = (ms: number): string => {
  const d = new Date(ms);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
};

const inputClass = 'bg-slate-800 border border-slate-600 text-white text-sm rounded px-3 py-1.5 focus:border-emerald-500 focus:outline-none';
const applyClass = 'bg-emerald-600 hover:bg-emerald-500 text-white text-sm font-medium px-4 py-1.5 rounded transition-colors';

const RangeSelector: React.FC<RangeSelectorProps> = ({ mode, availableYears, now, onSelect }) => {
  const [tab, setTab] = useState<ModeKind>(mode?.kind ?? 'today');
  const [refreshSeconds, setRefreshSeconds] = useState(
    mode?.kind === 'realtime' ? String(Math.round(mode.refreshIntervalMs / 1000)) : '1'
  );
  const [fromTime, setFromTime] = useState(mode?.kind === 'today' ? mode.fromTime : '00:00');
  const [toTime, setToTime] = useState(mode?.kind === 'today' ? mode.toTime : timeOfDay(now));
  const [day, setDay] = useState(mode?.kind === 'day' ? mode.date : isoDate(now));
  const [fromDate, setFromDate] = useState(mode?.kind === 'range' ? mode.fromDate : isoDate(now - 7 * 86400000));
  const [toDate, setToDate] = useState(mode?.kind === 'range' ? mode.toDate : isoDate(now));
  const [error, setError] = useState<string | null>(null);

  const apply = () => {
    setError(null);
    switch (tab) {
      case 'realtime': {
        const ms = parseRefreshSeconds(refreshSeconds);
        if (ms === null) {
          setError('Refresh interval must be between 1 and 60 seconds.');
          return;
        }
        onSelect(realtimeMode(ms));
        return;
      }
      case 'today':
        if (fromTime > toTime) {
          setError('Start time must not be after end time.');
          return;
        }
        onSelect({ kind: 'today', fromTime, toTime });
        return;
      case 'day':
        if (!day) return;
        onSelect({ kind: 'day', date: day });
        return;
      case 'range':
        if (!fromDate || !toDate || fromDate > toDate) {
          setError('Choose a start date on or before the end date.');
          return;
        }
        onSelect({ kind: 'range', fromDate, toDate });
        return;
    }
  };

  return (
    <div className="flex flex-col gap-3">
      <div className="flex flex-wrap bg-slate-900 rounded-lg p-1 border border-slate-700 w-fit">
        {TABS.map(({ kind, label }) => (
          <button
            key={kind}
            onClick={() => { setTab(kind); setError(null); }}
            className={`px-4 py-1.5 text-sm font-medium rounded-md transition-all ${
              tab === kind
                ? 'bg-slate-700 text-white shadow ring-1 ring-slate-600'
                : 'text-slate-400 hover:text-slate-200 hover:bg-slate-800/50'
            }`}
          >
            {label}
          </button>
        ))}
      </div>

      <div className="flex flex-col sm:flex-row flex-wrap items-center gap-3 bg-slate-900/50 p-3 rounded-lg border border-slate-700/50">
        {tab === 'realtime' && (
          <>
            <Radio size={16} className="text-emerald-400" />
            <label htmlFor="refresh-seconds" className="text-sm text-slate-400">Refresh every (s):</label>
            <input
              id="refresh-seconds"
              type="number"
              min={1}
              max={60}
              value={refreshSeconds}
              onChange={(e) => setRefreshSeconds(e.target.value)}
              className={`${inputClass} w-20`}
            />
          </>
        )}
        {tab === 'today' && (
          <>
            <Clock size={16} className="text-emerald-400" />
            <input aria-label="From time" type="time" value={fromTime} onChange={(e) => setFromTime(e.target.value)} className={inputClass} />
            <ArrowRight size={16} className="text-slate-500" />
            <input aria-label="To time" type="time" value={toTime} onChange={(e) => setToTime(e.target.value)} className={inputClass} />
          </>
        )}
        {tab === 'day' && (
          <>
            <Calendar size={16} className="text-emerald-400" />
            <input aria-label="Day" type="date" value={day} onChange={(e) => setDay(e.target.value)} className={inputClass} />
          </>
        )}
        {tab === 'range' && (
          <>
            <Calendar size={16} className="text-emerald-400" />
            <input aria-label="From date" type="date" value={fromDate} onChange={(e) => setFromDate(e.target.value)} className={inputClass} />
            <ArrowRight size={16} className="text-slate-500" />
            <input aria-label="To date" type="date" value={toDate} onChange={(e) => setToDate(e.target.value)} className={inputClass} />
            {availableYears.map((year) => (
              <button
                key={year}
                onClick={() => onSelect(yearMode(year))}
                className="px-3 py-1 text-xs font-medium rounded-full border border-slate-600 text-slate-300 hover:bg-slate-700"
              >
                {year}
              </button>
            ))}
          </>
        )}
        <button onClick={apply} className={applyClass}>Apply</button>
      </div>

      {error && <p role="alert" className="text-sm text-red-400">{error}</p>}
    </div>
  );
};

export default RangeSelector;
