import pino from "pino";

// stdout belongs to the package managers and SDK tools; log lines go to stderr.
export const logger = pino(
  {
    name: "flutter-android-setup",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination({ dest: 2, sync: true }),
);
