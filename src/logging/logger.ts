import pino from 'pino';

function defaultLevel(): string {
  if (process.env.FILING_VAULT_LOG_LEVEL) {
    return process.env.FILING_VAULT_LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  name: 'filing-vault',
  level: defaultLevel(),
});

export type Logger = pino.Logger;

const components = new Map<string, Logger>();

/**
 * Logger bound to one component (collection, catalog, storage, ...).
 */
export function componentLogger(component: string): Logger {
  let child = components.get(component);
  if (child === undefined) {
    child = logger.child({ component });
    components.set(component, child);
  }
  return child;
}

/**
 * Change the level of the root logger and every component logger.
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of components.values()) {
    child.level = level;
  }
}
