import type { StatusBand } from './types.js';
import { DEFAULT_STATUS_BANDS } from './profiles.js';

/**
 * Status text for an attempt number. Pure: the same attempt always maps to the
 * same band text.
 */
export function getStatusMessage(
  attempt: number,
  bands: readonly StatusBand[] = DEFAULT_STATUS_BANDS,
): string {
  for (const band of bands) {
    if (band.below === undefined || attempt < band.below) {
      return band.text;
    }
  }
  const last = bands[bands.length - 1];
  if (!last) {
    throw new Error('Status band table is empty');
  }
  return last.text;
}

export function validateStatusBands(bands: readonly StatusBand[]): void {
  if (bands.length === 0) {
    throw new Error('Status band table is empty');
  }
  let previous = -Infinity;
  bands.forEach((band, index) => {
    if (band.below === undefined) {
      if (index !== bands.length - 1) {
        throw new Error(`Unbounded status band must be last (found at index ${index})`);
      }
      return;
    }
    if (band.below <= previous) {
      throw new Error(`Status band bounds must increase (index ${index}: ${band.below})`);
    }
    previous = band.below;
  });
}
