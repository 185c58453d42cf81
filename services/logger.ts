// Category logger over the browser console.
// Debug categories stay quiet unless `localStorage['energy.debug']` is 'true' or VITE_ENERGY_DEBUG is set.

export type LogCategory = 'page' | 'data' | 'chart' | 'event';

const LABELS: Record<LogCategory | 'error' | 'warn', string> = {
  page: '[page]',
  data: '[data]',
  chart: '[chart]',
  event: '[event]',
  error: '[error]',
  warn: '[warn]',
};

const DEBUG_STORAGE_KEY = 'energy.debug';

const readDebugFlag = (): boolean => {
  if (import.meta.env?.VITE_ENERGY_DEBUG) return true;
  try {
    if (typeof window === 'undefined') return false;
    return window.localStorage.getItem(DEBUG_STORAGE_KEY) === 'true';
  } catch {
    return false;
  }
};

let debugEnabled: boolean | null = null;

const isDebugEnabled = (): boolean => {
  if (debugEnabled === null) debugEnabled = readDebugFlag();
  return debugEnabled;
};

const debug = (category: LogCategory) => (message: string, data?: unknown): void => {
  if (!isDebugEnabled()) return;
  if (data === undefined) console.debug(LABELS[category], message);
  else console.debug(LABELS[category], message, data);
};

export const logger = {
  page: debug('page'),
  data: debug('data'),
  chart: debug('chart'),
  event: debug('event'),
  warn: (message: string, data?: unknown): void => {
    if (data === undefined) console.warn(LABELS.warn, message);
    else console.warn(LABELS.warn, message, data);
  },
  error: (message: string, error?: unknown): void => {
    if (error === undefined) console.error(LABELS.error, message);
    else console.error(LABELS.error, message, error);
  },
};
