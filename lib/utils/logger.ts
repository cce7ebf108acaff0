export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const DEBUG_ENABLED = process.env.CLARIFY_DEBUG === 'true';

export const createLogger = (scope: string, isDebug: boolean = DEBUG_ENABLED): Logger => {
  return {
    debug: (...args: unknown[]) => {
      if (isDebug) {
        console.log(`[${scope} Debug]`, ...args);
      }
    },
    info: (...args: unknown[]) => {
      console.log(`[${scope} Info]`, ...args);
    },
    warn: (...args: unknown[]) => {
      console.warn(`[${scope} Warn]`, ...args);
    },
    error: (...args: unknown[]) => {
      console.error(`[${scope} Error]`, ...args);
    }
  };
};
