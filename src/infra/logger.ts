const prefix = () => `[${new Date().toISOString()}]`;

const debugEnabled = () => process.env.LOG_LEVEL?.trim().toLowerCase() === "debug";

export const logger = {
  info(...args: unknown[]) {
    console.log(prefix(), ...args);
  },
  warn(...args: unknown[]) {
    console.warn(prefix(), ...args);
  },
  error(...args: unknown[]) {
    console.error(prefix(), ...args);
  },
  debug(...args: unknown[]) {
    if (!debugEnabled()) return;
    console.debug(prefix(), ...args);
  },
};
