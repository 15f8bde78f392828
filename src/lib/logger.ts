/**
 * Lightweight logger that wraps console methods.
 * - debug and log only print in development with VIAL_SIM_DEBUG set, so a
 *   sweep over thousands of trials stays quiet by default.
 * - warn and error always print.
 */

const isDev = process.env.NODE_ENV !== 'production';

function verbose() {
  const flag = process.env.VIAL_SIM_DEBUG;
  return isDev && !!flag && flag !== '0' && flag.toLowerCase() !== 'false';
}

export const logger = {
  /** Debug info — only with VIAL_SIM_DEBUG */
  debug: (...args: unknown[]) => {
    if (verbose()) console.debug('[vial-sim]', ...args);
  },

  /** General info — only with VIAL_SIM_DEBUG */
  log: (...args: unknown[]) => {
    if (verbose()) console.log('[vial-sim]', ...args);
  },

  warn: (...args: unknown[]) => {
    console.warn('[vial-sim]', ...args);
  },

  error: (...args: unknown[]) => {
    console.error('[vial-sim]', ...args);
  },
} as const;
