import pino from "pino";

export function createLogger(level: string = "info") {
  return pino({
    level,
    transport: {
      target: "pino/file",
      options: { destination: 2 }, // stderr, stdout carries command output
    },
  });
}

export type Logger = ReturnType<typeof createLogger>;
