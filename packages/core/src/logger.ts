/** Minimal logging surface; `console` satisfies it. */
export type Logger = Pick<Console, 'info' | 'warn'>

/** Drops everything. Handy for tests and quiet CLI runs. */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
}
