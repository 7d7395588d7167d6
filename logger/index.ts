import pino, { type LoggerOptions } from "pino";
import { config, type AppConfig } from "../config";

export function createBaseLogger(
  { LOG_LEVEL, LOG_PRETTY }: AppConfig = config,
) {
  const options: LoggerOptions = {
    level: LOG_LEVEL,
    base: {
      service: "potluck",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      /**
       * Emit the level as its label ("info") rather than pino's numeric
       * value, so the JSON lines can be grepped by eye.
       */
      level(label) {
        return { level: label };
      },
    },
  };

  if (LOG_PRETTY) {
    try {
      const transport = pino.transport({
        target: "pino-pretty",
        options: {
          singleLine: true,
          colorize: true,
          translateTime: "SYS:standard",
        },
      });

      return pino(options, transport);
    } catch (error) {
      console.error(
        "Pretty logging requested but 'pino-pretty' is unavailable. Falling back to JSON logs.",
      );

      if (error instanceof Error && error.stack) {
        console.error(`${error.stack}`);
      } else if (error) {
        console.error(`${String(error)}`);
      }
    }
  }

  return pino(options);
}

export const baseLogger = createBaseLogger();
export type AppLogger = typeof baseLogger;
