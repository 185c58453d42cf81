import React from 'react';
import { AlertTriangle, BarChart3, Gauge, History, Leaf, PieChart as PieIcon, Wallet, Zap } from 'lucide-react';
import type { RateConfig, StatsView } from '../types';
import type { EnergyAnalyticsController } from '../services/analytics/EnergyAnalyticsController';
import type { DiscreteChartAdapter } from '../services/charts/DiscreteChartAdapter';
import { savedEnergyWh } from '../services/analytics/costModel';
import { TREND_TITLES, formatCo2, formatCost, formatEnergy, formatLoad } from '../services/analytics/format';
import { useChartSnapshot, useEnergyAnalytics } from '../hooks/useEnergyAnalytics';
import StatsCard from './StatsCard';
import CostTrendChart from './CostTrendChart';
import UsagePatternDonut from './UsagePatternDonut';
import RealtimeCostChart from './RealtimeCostChart';
import RangeSelector from './RangeSelector';
import DrillDownModal from './DrillDownModal';

interface EnergyPageProps {
  controller: EnergyAnalyticsController;
}

const SkeletonCard = ({ height }: { height: string }) => (
  <div className={`bg-slate-800/50 rounded-2xl border border-slate-700/50 ${height} w-full`}></div>
);

const StatsGrid: React.FC<{ stats: StatsView | null; failed: boolean; rate: RateConfig }> = ({ stats, failed, rate }) => {
  if (!stats && failed) {
    return (
      <div className="flex items-center justify-center gap-2 h-32 bg-slate-800/60 rounded-2xl border border-slate-700/60 text-slate-400 text-sm">
        <AlertTriangle size={16} className="text-amber-400" />
        Energy statistics unavailable.
      </div>
    );
  }
  if (!stats) {
    return (
      <div className="grid grid-cols-2 lg:grid-cols-4 gap-4 animate-pulse">
        <SkeletonCard height="h-32" />
        <SkeletonCard height="h-32" />
        <SkeletonCard height="h-32" />
        <SkeletonCard height="h-32" />
      </div>
    );
  }
  return (
    <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
      <StatsCard
        title={stats.live ? 'Current Power' : TREND_TITLES.energy}
        value={formatEnergy(stats.energy, stats.live)}
        icon={<Zap size={18} />}
        valueColor="text-yellow-400"
        trend={stats.trends?.energy}
        highlight={stats.live}
        subValue={
          !stats.live && rate.efficiencyFactor > 0
            ? `Saved ${formatEnergy(savedEnergyWh(stats.energy, rate.efficiencyFactor), false)}`
            : undefined
        }
      />
      <StatsCard
        title={stats.live ? 'Current Cost' : TREND_TITLES.cost}
        value={formatCost(stats.cost, rate.currencyCode, stats.live)}
        icon={<Wallet size={18} />}
        valueColor="text-emerald-400"
        trend={stats.trends?.cost}
        subValue={stats.live ? 'per hour at this power' : undefined}
      />
      <StatsCard
        title={stats.live ? 'UPS Load' : TREND_TITLES.load}
        value={formatLoad(stats.load)}
        icon={<Gauge size={18} />}
        valueColor="text-blue-400"
        trend={stats.trends?.load}
      />
      <StatsCard
        title={TREND_TITLES.co2}
        value={formatCo2(stats.co2)}
        icon={<Leaf size={18} />}
        valueColor="text-green-400"
        trend={stats.trends?.co2}
      />
    </div>
  );
};

const DiscreteCharts: React.FC<{ adapter: DiscreteChartAdapter; rate: RateConfig; showDistribution: boolean }> = ({
  adapter,
  rate,
  showDistribution
}) => {
  const snapshot = useChartSnapshot(adapter);

  return (
    <div className={`grid grid-cols-1 ${showDistribution ? 'lg:grid-cols-3' : ''} gap-6`}>
      <div className={`${showDistribution ? 'lg:col-span-2' : ''} bg-slate-800 rounded-2xl p-6 border border-slate-700 shadow-lg h-[400px] flex flex-col`}>
        <h3 className="text-slate-400 text-sm font-medium mb-6 flex items-center gap-2 shrink-0">
          <BarChart3 size={16} /> Cost Trend
        </h3>
        <div className="flex-1 min-h-0 w-full">
          <CostTrendChart
            series={snapshot.series}
            period={snapshot.period}
            currency={rate.currencyCode}
            pricePerKwh={rate.pricePerKwh}
            onSelectPoint={(index) => adapter.selectPoint(index)}
          />
        </div>
      </div>
      {showDistribution && (
        <div className="bg-slate-800 rounded-2xl p-6 border border-slate-700 shadow-lg h-[400px] flex flex-col">
          <h3 className="text-slate-400 text-sm font-medium mb-6 flex items-center gap-2 shrink-0">
            <PieIcon size={16} /> Usage Pattern
          </h3>
          <div className="flex-1 min-h-0 w-full">
            <UsagePatternDonut distribution={snapshot.distribution} currency={rate.currencyCode} />
          </div>
        </div>
      )}
    </div>
  );
};

const EnergyPage: React.FC<EnergyPageProps> = ({ controller }) => {
  const state = useEnergyAnalytics(controller);
  const { chart, rate, layout } = state;

  return (
    <div className="space-y-6">
      <div className="flex flex-col bg-slate-800/60 backdrop-blur p-3 rounded-xl border border-slate-700/50 gap-4 shadow-lg">
        <div className="flex flex-col sm:flex-row items-center gap-2 sm:gap-4">
          <h2 className="text-lg font-semibold text-slate-200 px-2 flex items-center gap-2 shrink-0">
            <History size={18} className="text-emerald-400" />
            Energy Analysis
          </h2>
          <div data-testid="range-label" className="px-4 py-1.5 bg-slate-900/80 border border-slate-700/50 rounded-full text-emerald-400 text-sm font-bold shadow-inner">
            {state.label}
          </div>
        </div>
        {state.mode && (
          <RangeSelector
            key={state.mode.kind}
            mode={state.mode}
            availableYears={state.availableYears}
            now={state.now}
            onSelect={(mode) => {
              void controller.selectMode(mode);
            }}
          />
        )}
      </div>

      <StatsGrid stats={state.stats} failed={state.statsFailed} rate={rate} />

      {chart?.kind === 'streaming' && (
        <div className="bg-slate-800 rounded-2xl p-6 border border-slate-700 shadow-lg h-[400px] flex flex-col">
          <h3 className="text-slate-400 text-sm font-medium mb-6 flex items-center gap-2 shrink-0">
            <Zap size={16} /> Live Cost
          </h3>
          <div className="flex-1 min-h-0 w-full">
            <RealtimeCostChart adapter={chart.adapter} currency={rate.currencyCode} />
          </div>
        </div>
      )}
      {chart?.kind === 'discrete' && (
        <div className={state.loading ? 'opacity-60 transition-opacity' : 'transition-opacity'}>
          <DiscreteCharts adapter={chart.adapter} rate={rate} showDistribution={layout.showDistribution} />
        </div>
      )}
      {!chart && state.status !== 'idle' && state.mode && (
        <div className="flex items-center justify-center h-48 text-slate-500">Chart unavailable.</div>
      )}

      <DrillDownModal
        view={state.drillDown}
        currency={rate.currencyCode}
        pricePerKwh={rate.pricePerKwh}
        onSelectPoint={(index) => {
          void controller.selectDrillDownPoint(index);
        }}
        onClose={() => controller.closeDrillDown()}
      />
    </div>
  );
};

export default EnergyPage;
