/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = silent, 1 = progress … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

/**
 * With a `tag` lines read `tag: msg` (Unix tool style), otherwise `lvl| msg`.
 * The default sink is stderr so diagnostics never land in result output.
 */
export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.error,
  tag? : string,
): Logger {
  return {
    level,
    log(lvl, msg) {
      if (lvl > level) return;
      sink(tag ? `${tag}: ${msg}` : `${lvl}| ${msg}`);
    },
  };
}

export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n >= 4) return 4;
  switch (Math.floor(n)) {
    case 1:  return 1;
    case 2:  return 2;
    default: return 3;
  }
}
