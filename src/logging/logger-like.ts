/**
 * The subset of the pino logger the library calls into. Callers pass their own
 * pino instance (or a child of it); library code never creates a logger.
 */
export type LoggerLike = {
  debug(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};
