import { energyApi } from '../api';
import { systemClock } from '../clock';
import type { EngineOptionsInput } from '../config';
import { toastNotifier } from '../notifier';
import { createSocketPushChannel } from '../pushChannel';
import { EnergyAnalyticsController } from './EnergyAnalyticsController';

const PUSH_URL: string | undefined = import.meta.env?.VITE_PUSH_URL || undefined;

/** Production wiring: HTTP API, Socket.IO push, wall clock and toast notifications. */
export const createEnergyController = (options?: EngineOptionsInput): EnergyAnalyticsController =>
  new EnergyAnalyticsController({
    api: energyApi,
    push: createSocketPushChannel({ url: PUSH_URL }),
    clock: systemClock,
    notifier: toastNotifier,
    options,
  });
