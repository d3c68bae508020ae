/**
 * Utility for conditional logging that can be disabled in production.
 * Debug statements stay in the code but are silenced when NODE_ENV is production.
 */

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

export const logger = {
  /**
   * Debug log - only appears outside production
   */
  debug: (...args: unknown[]): void => {
    if (!isProduction()) {
      console.log('[DEBUG]', ...args);
    }
  },

  info: (...args: unknown[]): void => {
    console.info('[INFO]', ...args);
  },

  warn: (...args: unknown[]): void => {
    console.warn('[WARNING]', ...args);
  },

  error: (...args: unknown[]): void => {
    console.error('[ERROR]', ...args);
  }
};

export default logger;
