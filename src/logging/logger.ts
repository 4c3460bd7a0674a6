import pino from "pino";

export type RelayLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

const isDev = process.env.NODE_ENV !== "production";

const resolveLevel = () =>
  process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : isDev ? "debug" : "info");

const rootLogger = pino({
  level: resolveLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDev && process.env.PINO_PRETTY === "1"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export function createLogger(component: string): RelayLogger {
  return rootLogger.child({ component });
}

export const silentLogger: RelayLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);
