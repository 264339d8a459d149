export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type LoggerOptions = {
  debug?: boolean;
  // Drops all output; used by tests and by commands that print machine-readable output.
  silent?: boolean;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug === true && options.silent !== true;
  const enabled = options.silent !== true;
  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) {
        console.debug("[DEBUG]", ...args);
      }
    },
    info: (...args: unknown[]) => {
      if (enabled) {
        console.log("[INFO]", ...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (enabled) {
        console.warn("[WARN]", ...args);
      }
    },
    error: (...args: unknown[]) => {
      if (enabled) {
        console.error("[ERROR]", ...args);
      }
    },
  };
}

let activeLogger: Logger = createLogger();

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function getLogger(): Logger {
  return activeLogger;
}
