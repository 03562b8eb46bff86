/**
 * Error Taxonomy
 * Every failure the simulator reports carries a kind and the process exit code for it.
 */

export type SimulationErrorKind = 'map_parse' | 'invalid_configuration' | 'unknown_colony';

const EXIT_CODES: Record<SimulationErrorKind, number> = {
  invalid_configuration: 2,
  map_parse: 3,
  unknown_colony: 70,
};

export abstract class SimulationError extends Error {
  abstract readonly kind: SimulationErrorKind;

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

/** Malformed map line or duplicate colony definition. */
export class MapParseError extends SimulationError {
  readonly kind = 'map_parse';
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = 'MapParseError';
    this.line = line;
  }
}

/** Ant count, placement policy, settings or map path rejected before the run starts. */
export class InvalidConfigurationError extends SimulationError {
  readonly kind = 'invalid_configuration';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * An edge or placement referenced a colony that is not in the graph.
 * The engine never triggers this itself; it means the loader broke the graph contract.
 */
export class UnknownColonyError extends SimulationError {
  readonly kind = 'unknown_colony';
  readonly colony: string;

  constructor(colony: string) {
    super(`Unknown colony: ${colony}`);
    this.name = 'UnknownColonyError';
    this.colony = colony;
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

const KIND_LABELS: Record<SimulationErrorKind, string> = {
  map_parse: 'Map file is malformed',
  invalid_configuration: 'Invalid configuration',
  unknown_colony: 'Internal error: map loader referenced an unknown colony',
};

const SYSTEM_PATTERNS: Array<{ test: (lower: string) => boolean; message: string }> = [
  { test: (s) => s.includes('enoent'), message: 'File or directory not found' },
  { test: (s) => s.includes('eacces') || s.includes('eperm'), message: 'Permission denied' },
  { test: (s) => s.includes('eisdir'), message: 'Expected a file but found a directory' },
];

/** Turn any thrown value into a one-line message prefixed by its failure kind. */
export function describeError(err: unknown): string {
  if (err instanceof SimulationError) {
    return `${KIND_LABELS[err.kind]}: ${err.message}`;
  }

  const message = err instanceof Error ? err.message : String(err);
  const lower = message.toLowerCase();
  for (const pattern of SYSTEM_PATTERNS) {
    if (pattern.test(lower)) return `${pattern.message}: ${message}`;
  }
  return message;
}

export function exitCodeFor(err: unknown): number {
  return err instanceof SimulationError ? err.exitCode : 1;
}
