export type StampErrorCode = 'CONFIG' | 'RESOURCE' | 'COLLABORATOR' | 'STATE_LOCKED';

export abstract class StampError extends Error {
  abstract readonly code: StampErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid scale, page index or density override. Raised before any state changes. */
export class ConfigError extends StampError {
  readonly code = 'CONFIG';
}

/** Document unreadable, stamp undecodable, output not writable. */
export class ResourceError extends StampError {
  readonly code = 'RESOURCE';
}

export type SpliceStep =
  | 'extract-target'
  | 'draw-overlay'
  | 'merge-overlay'
  | 'extract-before'
  | 'extract-after'
  | 'concatenate';

/** A page-range or merge call failed during a splice. */
export class CollaboratorError extends StampError {
  readonly code = 'COLLABORATOR';

  constructor(readonly step: SpliceStep, cause: unknown) {
    super(`Splice step "${step}" failed: ${describeCause(cause)}`, { cause });
  }
}

/** Placement was changed, or a save requested, while a splice holds the snapshot. */
export class StateLockedError extends StampError {
  readonly code = 'STATE_LOCKED';
}

/**
 * Reported, never thrown: the stamp carried no usable resolution metadata and the
 * fallback density was used, which changes the physical stamp size.
 */
export interface DegradedResolution {
  kind: 'degraded-resolution';
  densityPerInch: number;
  reason: string;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function isStampError(error: unknown): error is StampError {
  return error instanceof StampError;
}
