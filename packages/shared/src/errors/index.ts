/**
 * Error taxonomy shared by every RoadVoid package
 */

/** Base class carrying a stable machine-readable code */
export class RoadVoidError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoadVoidError';
    this.code = code;
  }
}

/**
 * Malformed or out-of-range configuration. Carries every violation found so
 * the whole file can be fixed in one pass.
 */
export class ConfigurationError extends RoadVoidError {
  public readonly violations: string[];

  constructor(violations: string[]) {
    const header = `Invalid configuration (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super('CONFIGURATION', `${header}\n${body}`);
    this.name = 'ConfigurationError';
    this.violations = violations;
  }
}

/** Location of a failure within a generation run */
export interface StageLocation {
  sequenceId?: number;
  stage?: number;
}

function describeLocation(location: StageLocation): string {
  const parts: string[] = [];
  if (location.sequenceId !== undefined) parts.push(`sequence ${location.sequenceId}`);
  if (location.stage !== undefined) parts.push(`stage ${location.stage}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/** Void bounding volume escapes the road or domain extent */
export class GeometryError extends RoadVoidError {
  public readonly sequenceId?: number;
  public readonly stage?: number;

  constructor(message: string, location: StageLocation = {}) {
    super('GEOMETRY', `${message}${describeLocation(location)}`);
    this.name = 'GeometryError';
    this.sequenceId = location.sequenceId;
    this.stage = location.stage;
  }

  /** Copy of this error tagged with the sequence and stage it came from */
  at(location: StageLocation): GeometryError {
    return new GeometryError(this.message, location);
  }
}

/** A scenario or manifest file could not be written or read */
export class IOError extends RoadVoidError {
  public readonly path: string;
  public readonly operation: 'read' | 'write';
  public readonly sequenceId?: number;
  public readonly stage?: number;

  constructor(
    path: string,
    cause: unknown,
    location: StageLocation = {},
    operation: 'read' | 'write' = 'write'
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('IO', `Cannot ${operation} ${path}${describeLocation(location)}: ${reason}`, { cause });
    this.name = 'IOError';
    this.path = path;
    this.operation = operation;
    this.sequenceId = location.sequenceId;
    this.stage = location.stage;
  }
}

/** Scenario text or directive list that the solver would not accept */
export class ScenarioFormatError extends RoadVoidError {
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super('SCENARIO_FORMAT', line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'ScenarioFormatError';
    this.line = line;
  }
}
