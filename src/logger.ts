export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const PREFIX = '[PermissionRegistry]';

export const consoleLogger: Logger = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} ${message}`),
  error: (message, error) =>
    error === undefined
      ? console.error(`${PREFIX} ${message}`)
      : console.error(`${PREFIX} ${message}`, error),
};
