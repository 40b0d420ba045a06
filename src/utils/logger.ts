import pino from "pino";

const REDACTION_PATHS = [
  "secret",
  "signature",
  "password",
  "databaseUrl",
  "redisUrl",
  "headers.authorization",
  'headers["x-signature"]',
];

export function createLogger(options?: pino.LoggerOptions) {
  return pino({
    level: process.env.LOG_LEVEL || "info",
    base: { service: "wallet-ledger" },
    redact: {
      paths: REDACTION_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  });
}


export const logger = createLogger();
