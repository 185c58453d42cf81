import React, { useEffect, useState } from 'react';
import { BatteryCharging, RefreshCw } from 'lucide-react';
import { Toaster } from 'sonner';
import EnergyPage from './components/EnergyPage';
import type { EnergyAnalyticsController } from './services/analytics/EnergyAnalyticsController';
import { createEnergyController } from './services/analytics/createController';
import { useEnergyAnalytics } from './hooks/useEnergyAnalytics';
import { logger } from './services/logger';

interface AppProps {
  createController?: () => EnergyAnalyticsController;
}

const Header: React.FC<{ controller: EnergyAnalyticsController }> = ({ controller }) => {
  const { now, lastUpdated, status } = useEnergyAnalytics(controller);

  return (
    <header className="sticky top-0 z-50 bg-slate-900/80 backdrop-blur-md border-b border-slate-800">
      <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
        <div className="flex justify-between items-center h-16">
          <div className="flex items-center gap-3">
            <div className="bg-emerald-500 p-2 rounded-lg text-slate-900">
              <BatteryCharging size={24} strokeWidth={2.5} />
            </div>
            <div>
              <h1 className="text-xl font-bold tracking-tight">UPS Energy</h1>
              <div className="flex items-center gap-2 text-xs text-slate-400">
                <span className={`inline-block w-2 h-2 rounded-full ${status === 'ready' ? 'bg-green-500' : 'bg-slate-500'}`}></span>
                {status === 'ready' ? 'Monitoring' : 'Connecting'}
              </div>
            </div>
          </div>

          <div className="flex flex-col items-end text-xs text-slate-400">
            <span data-testid="clock" className="text-slate-200 font-mono text-sm">{new Date(now).toLocaleTimeString()}</span>
            {lastUpdated !== null && (
              <span>Updated {Math.max(0, Math.round((now - lastUpdated) / 1000))}s ago</span>
            )}
          </div>
        </div>
      </div>
    </header>
  );
};

const App: React.FC<AppProps> = ({ createController = createEnergyController }) => {
  const [controller, setController] = useState<EnergyAnalyticsController | null>(null);

  // One controller per mount; disposal stops every timer, request and push subscription it owns.
  useEffect(() => {
    const created = createController();
    setController(created);
    created.start().catch((e: unknown) => logger.error('Energy page failed to start', e));
    return () => {
      created.dispose();
      setController(null);
    };
  }, [createController]);

  return (
    <div className="min-h-screen bg-slate-900 text-slate-100 selection:bg-emerald-500 selection:text-slate-900">
      <Toaster richColors position="top-right" closeButton />
      {controller && <Header controller={controller} />}

      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
        {controller ? (
          <EnergyPage controller={controller} />
        ) : (
          <div className="flex flex-col items-center justify-center h-96 gap-4 text-slate-500">
            <RefreshCw className="animate-spin" size={48} />
            <p>Connecting to UPS monitor...</p>
          </div>
        )}
      </main>
    </div>
  );
};

export default App;
