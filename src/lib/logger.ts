import { ANALYZE_TRACE } from '@/lib/config';

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/**
 * Tagged console logger. `info` is dropped in production builds, and `debug`
 * also needs NEXT_PUBLIC_ANALYZE_TRACE. Warnings and errors always print.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  const isDev = () => process.env.NODE_ENV !== 'production';
  return {
    debug: (...args) => {
      if (ANALYZE_TRACE && isDev()) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (isDev()) console.info(prefix, ...args);
    },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}
