import type { AggregateResult, CostPoint, DetailQuery, EnergyQuery, RateConfig, Sample } from '../types';
import { MalformedResponse, NetworkFailure } from './errors';
import { logger } from './logger';
import {
  AggregateResultSchema,
  AvailableYearsSchema,
  CostSeriesSchema,
  RateConfigSchema,
  UpsCacheSchema,
  parseApiResponse,
  toSample,
} from './schemas';

// Relative by default so requests stay under the reverse-proxy sub-path the page is served from.
const API_BASE: string = import.meta.env?.VITE_API_BASE ?? '';

const apiUrl = (path: string): string => {
  const p = path.startsWith('/') ? path.slice(1) : path;
  const base = API_BASE ? API_BASE.replace(/\/+$/, '') + '/' : '';
  return `${base}${p}`;
};

const DEFAULT_TIMEOUT_MS = 10000;

export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

const withQuery = (path: string, params: Record<string, string | undefined>): string => {
  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') qs.append(key, value);
  }
  const query = qs.toString();
  return query ? `${path}?${query}` : path;
};

const apiFetchJson = async (path: string, opts: RequestOptions = {}): Promise<unknown> => {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const forwardAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', forwardAbort);

  let res: Response;
  try {
    if (opts.signal?.aborted) throw new Error('aborted');
    res = await fetch(apiUrl(path), { signal: controller.signal });
  } catch (e) {
    const reason = timedOut ? 'timed out' : opts.signal?.aborted ? 'aborted' : e instanceof Error ? e.message : String(e);
    throw new NetworkFailure(path, reason);
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', forwardAbort);
  }

  if (!res.ok) throw new NetworkFailure(path, `HTTP ${res.status}`, res.status);

  try {
    return await res.json();
  } catch {
    throw new MalformedResponse(path, 'body is not JSON');
  }
};

const energyParams = (query: EnergyQuery): Record<string, string | undefined> => ({
  from_time: query.from_time,
  to_time: query.to_time,
  type: query.type,
});

export const getEnergyData = async (query: EnergyQuery, opts?: RequestOptions): Promise<AggregateResult> => {
  const path = withQuery('api/energy/data', energyParams(query));
  logger.data('Fetching energy data', query);
  return parseApiResponse(AggregateResultSchema, await apiFetchJson(path, opts), path);
};

export const getCostTrend = async (query: EnergyQuery, opts?: RequestOptions): Promise<CostPoint[]> => {
  const path = withQuery('api/energy/cost-trend', energyParams(query));
  return parseApiResponse(CostSeriesSchema, await apiFetchJson(path, opts), path);
};

export const getDetailedSeries = async (query: DetailQuery, opts?: RequestOptions): Promise<CostPoint[]> => {
  const path = withQuery('api/energy/detailed', {
    from_time: query.from_time,
    to_time: query.to_time,
    detail_type: query.detail_type,
  });
  return parseApiResponse(CostSeriesSchema, await apiFetchJson(path, opts), path);
};

export const getAvailableYears = async (opts?: RequestOptions): Promise<number[]> => {
  const path = 'api/energy/available-years';
  return parseApiResponse(AvailableYearsSchema, await apiFetchJson(path, opts), path);
};

export const getRateConfig = async (opts?: RequestOptions): Promise<RateConfig> => {
  const path = 'api/settings/variables';
  return parseApiResponse(RateConfigSchema, await apiFetchJson(path, opts), path);
};

export const getLiveSample = async (timestamp: number, opts?: RequestOptions): Promise<Sample> => {
  const path = 'api/ups/cache';
  const body = parseApiResponse(UpsCacheSchema, await apiFetchJson(path, opts), path);
  return toSample(body, timestamp, path);
};

// The controller only sees this surface, so tests can hand it an in-process fake.
export interface EnergyApi {
  getEnergyData(query: EnergyQuery, opts?: RequestOptions): Promise<AggregateResult>;
  getCostTrend(query: EnergyQuery, opts?: RequestOptions): Promise<CostPoint[]>;
  getDetailedSeries(query: DetailQuery, opts?: RequestOptions): Promise<CostPoint[]>;
  getAvailableYears(opts?: RequestOptions): Promise<number[]>;
  getRateConfig(opts?: RequestOptions): Promise<RateConfig>;
  getLiveSample(timestamp: number, opts?: RequestOptions): Promise<Sample>;
}

export const energyApi: EnergyApi = {
  getEnergyData,
  getCostTrend,
  getDetailedSeries,
  getAvailableYears,
  getRateConfig,
  getLiveSample,
};
