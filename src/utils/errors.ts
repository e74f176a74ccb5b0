/**
 * Error taxonomy for the source map codec.
 *
 * Every error is fatal for the call that raised it. Callers that process many
 * maps catch `SourceMapError` per map and carry on with the next one.
 */

export type SourceMapErrorCode =
  | 'MALFORMED_VLQ'
  | 'MALFORMED_MAPPING'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_POSITION'
  | 'INVALID_SOURCE_MAP';

export class SourceMapError extends Error {
  readonly code: SourceMapErrorCode;

  constructor(code: SourceMapErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceMapError';
    this.code = code;
  }
}

/**
 * Where in a mappings string a segment sits. Lines and segments are 0-based.
 */
export type SegmentLocation = {
  line?: number;
  segment?: number;
  token?: string;
};

function describeLocation(location: SegmentLocation): string {
  const parts: string[] = [];
  if (location.line !== undefined) parts.push(`generated line ${location.line}`);
  if (location.segment !== undefined) parts.push(`segment ${location.segment}`);
  if (location.token !== undefined) parts.push(`"${location.token}"`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export class MalformedMappingError extends SourceMapError {
  readonly reason: string;
  readonly line?: number;
  readonly segment?: number;
  readonly token?: string;

  constructor(
    reason: string,
    location: SegmentLocation = {},
    options?: ErrorOptions,
    code: SourceMapErrorCode = 'MALFORMED_MAPPING'
  ) {
    super(code, reason + describeLocation(location), options);
    this.name = 'MalformedMappingError';
    this.reason = reason;
    this.line = location.line;
    this.segment = location.segment;
    this.token = location.token;
  }
}

/**
 * Raised by the VLQ codec without a location; the decoder re-raises it with
 * the generated line and segment filled in.
 */
export class MalformedVlqError extends MalformedMappingError {
  constructor(reason: string, location: SegmentLocation = {}, options?: ErrorOptions) {
    super(reason, location, options, 'MALFORMED_VLQ');
    this.name = 'MalformedVlqError';
  }
}

export class IndexOutOfRangeError extends SourceMapError {
  readonly table: 'sources' | 'names';
  readonly index: number;
  readonly line?: number;
  readonly segment?: number;

  constructor(table: 'sources' | 'names', index: number, size: number, location: SegmentLocation = {}) {
    super(
      'INDEX_OUT_OF_RANGE',
      `${table} index ${index} is out of range for ${size} entries` + describeLocation(location)
    );
    this.name = 'IndexOutOfRangeError';
    this.table = table;
    this.index = index;
    this.line = location.line;
    this.segment = location.segment;
  }
}

export class InvalidPositionError extends SourceMapError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('INVALID_POSITION', `${path}: ${message}`);
    this.name = 'InvalidPositionError';
    this.path = path;
  }
}

export class InvalidSourceMapError extends SourceMapError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_SOURCE_MAP', message, options);
    this.name = 'InvalidSourceMapError';
  }
}
