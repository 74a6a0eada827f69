import type { StampResolution } from '@/types/stamp';
import { ConfigError, type DegradedResolution } from './errors';
import { probeDensityMetadata } from './imageMetadata';
import { createLogger } from './logger';

export const FALLBACK_DENSITY = 72;

const log = createLogger('RESOLUTION');

export interface ResolveStampDensityOptions {
  /** Explicit pixels-per-inch. `undefined` or `0` means "read it from the image". */
  densityOverride?: number;
}

export interface ResolvedStampDensity {
  resolution: StampResolution;
  diagnostic: DegradedResolution | null;
}

/**
 * Determine the stamp's pixel density.
 *
 * An explicit override wins and skips the metadata probe. Otherwise the image header is
 * read; when it carries no usable resolution the fallback of 72 is used and a
 * DegradedResolution diagnostic is returned alongside.
 */
export function resolveStampDensity(
  bytes: Uint8Array,
  options: ResolveStampDensityOptions = {}
): ResolvedStampDensity {
  const override = options.densityOverride;

  if (override !== undefined && override !== 0) {
    if (!Number.isFinite(override) || override < 0) {
      throw new ConfigError(`Stamp density override must be positive, got ${override}`);
    }
    log.debug('Using explicit stamp density', { densityPerInch: override });
    return { resolution: { densityPerInch: override, source: 'explicit' }, diagnostic: null };
  }

  const probed = probeDensityMetadata(bytes);
  if (probed !== null) {
    log.info(`Stamp has DPI ${probed.toFixed(1)}`);
    return { resolution: { densityPerInch: probed, source: 'metadata' }, diagnostic: null };
  }

  const diagnostic: DegradedResolution = {
    kind: 'degraded-resolution',
    densityPerInch: FALLBACK_DENSITY,
    reason: 'No resolution metadata found in stamp image',
  };
  log.warn(`${diagnostic.reason}. Using ${FALLBACK_DENSITY} DPI`);
  return { resolution: { densityPerInch: FALLBACK_DENSITY, source: 'fallback' }, diagnostic };
}
