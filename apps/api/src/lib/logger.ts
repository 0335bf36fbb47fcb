import pino, { type Logger, type LoggerOptions } from "pino";

export function createLoggerOptions(
  env: Record<string, string | undefined> = process.env,
): LoggerOptions {
  const nodeEnv = env["NODE_ENV"];

  const base: LoggerOptions = {
    level: nodeEnv === "test" ? "silent" : (env["LOG_LEVEL"] ?? "info"),
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (nodeEnv === "development") {
    return {
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    };
  }

  return base;
}

export const logger = pino(createLoggerOptions());

export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
