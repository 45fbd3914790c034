/**
 * Verbosity-gated diagnostics.
 *
 * Lines look like `[ChunkReader.next] offset=0x0 kind=header length=512`.
 * Level 1 traces chunks, level 2 decoded fields, level 3 per-channel detail.
 */

export type LogWriter = (line: string) => void;

export class Logger {
  constructor(
    readonly verbosity: number = 0,
    private readonly write: LogWriter = (line) => console.error(line),
  ) {}

  enabled(level: number): boolean {
    return this.verbosity >= level;
  }

  trace(level: number, scope: string, message: string): void {
    if (this.verbosity >= level) {
      this.write(`[${scope}] ${message}`);
    }
  }
}

/** Format an integer as unpadded hex, e.g. `0x3000`. */
export function hex(value: number): string {
  return value < 0 ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
}
