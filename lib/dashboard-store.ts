/**
 * Process-wide holder of the dashboard context.
 *
 * The instrumentation hook and the route handlers are bundled separately, each
 * with its own copy of this module, so the state lives on `globalThis` under a
 * registry symbol both copies resolve to.
 * Only the instrumentation hook loads; routes read what it produced.
 */

import { getConfig } from './config';
import { createDashboardContext } from './dashboard-context';
import { DataUnavailableError } from './dataset-errors';
import { loadAppointments } from './dataset-loader';
import { logger } from './logger';
import type { DashboardContext } from './types/dashboard';

export type ContextLoader = () => Promise<DashboardContext>;

type StoreState = {
  promise: Promise<DashboardContext> | null;
  context: DashboardContext | null;
};

const STORE_KEY: unique symbol = Symbol.for('noshow-dashboard.context-store');

type GlobalWithStore = typeof globalThis & { [STORE_KEY]?: StoreState };

function storeState(): StoreState {
  const root: GlobalWithStore = globalThis;
  let state = root[STORE_KEY];
  if (!state) {
    state = { promise: null, context: null };
    root[STORE_KEY] = state;
  }
  return state;
}

async function loadFromConfig(): Promise<DashboardContext> {
  const { datasetUrl } = getConfig();
  const dataset = await loadAppointments(datasetUrl);
  return createDashboardContext(dataset);
}

/**
 * Starts the one load of the process. Later calls return the same promise,
 * rejected or not: a failed load is never retried.
 */
export function initDashboardContext(loader: ContextLoader = loadFromConfig): Promise<DashboardContext> {
  const state = storeState();
  if (!state.promise) {
    state.promise = loader().then((context) => {
      state.context = context;
      for (const warning of context.dataQuality.warnings) {
        logger.warn('[Dataset] Data quality:', warning);
      }
      logger.info('[Dataset] Dashboard context ready:', {
        appointments: context.summary.totalAppointments,
      });
      return context;
    });
  }
  return state.promise;
}

/** The startup load; rejects if startup has not begun one. */
export function getDashboardContext(): Promise<DashboardContext> {
  const { promise } = storeState();
  if (!promise) {
    return Promise.reject(new DataUnavailableError('Dataset has not been loaded'));
  }
  return promise;
}

/** The context if loading has finished, null otherwise. */
export function peekDashboardContext(): DashboardContext | null {
  return storeState().context;
}

export function resetDashboardContext(): void {
  const state = storeState();
  state.promise = null;
  state.context = null;
}
