/**
 * Production-safe logger that no-ops in production builds
 * to avoid console overhead at streaming rates
 */

const isProduction = import.meta.env.PROD;

type LogFn = (...args: unknown[]) => void;

const noop: LogFn = () => {};

export const logger: Record<'log' | 'error' | 'warn' | 'info' | 'debug', LogFn> = {
  log: isProduction ? noop : console.log.bind(console),
  error: isProduction ? noop : console.error.bind(console),
  warn: isProduction ? noop : console.warn.bind(console),
  info: isProduction ? noop : console.info.bind(console),
  debug: isProduction ? noop : console.debug.bind(console),
};
