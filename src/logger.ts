const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;

type Level = keyof typeof LEVELS;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogWriter = (line: string) => void;

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function getLogLevel(): Level {
  const env = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevel(env) ? env : "info";
}

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(line);
};

export function createLogger(
  scope: string,
  write: LogWriter = stderrWriter,
): Logger {
  const writeLog = (level: Level, message: string): void => {
    if (LEVELS[level] < LEVELS[getLogLevel()]) return;
    write(`[${level.toUpperCase()}] ${scope}: ${message}\n`);
  };
  return {
    debug: (message: string): void => writeLog("debug", message),
    info: (message: string): void => writeLog("info", message),
    warn: (message: string): void => writeLog("warn", message),
    error: (message: string): void => writeLog("error", message),
  };
}

export const log = createLogger("mood-digest");
