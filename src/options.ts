// Options accepted by parse()

export interface ParseOptions {
  /** Module name; top-level names are prefixed with it when given. */
  name?: string;
  targetVersion: readonly number[];
  targetPlatform: string;
  /** Shown in error messages. */
  filename?: string;
}

export const DEFAULT_PARSE_OPTIONS: Readonly<ParseOptions> = Object.freeze({
  targetVersion: Object.freeze([2, 7, 6]),
  targetPlatform: 'linux',
});

export function resolveParseOptions(options: Partial<ParseOptions> = {}): ParseOptions {
  return { ...DEFAULT_PARSE_OPTIONS, ...options };
}
