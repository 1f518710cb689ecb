import pino from "pino";

// Operator reports go to stdout; structured logs stay on stderr so the two never interleave.
export const logger = pino(
  {
    name: "wsl-baseline",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination({ dest: 2, sync: true }),
);
