import type {
  Detection,
  PartitionAnalysis,
  Zone,
  ZoneCoverage,
} from '@/types/navigation';

/**
 * Partition Analyzer
 *
 * Splits the frame into three equal vertical strips (left / center / right)
 * and measures how much of each strip a detection's box covers.
 * frameWidth may be pixels or the normalized width 1; only ratios matter.
 */

export const ZONES: readonly Zone[] = ['left', 'center', 'right'];

export function zoneOf(x: number, frameWidth: number = 1): Zone {
  if (x < frameWidth / 3) return 'left';
  if (x < (frameWidth * 2) / 3) return 'center';
  return 'right';
}

function coverage(left: number, right: number, zoneStart: number, zoneEnd: number): number {
  const overlap = Math.min(right, zoneEnd) - Math.max(left, zoneStart);
  if (overlap <= 0) return 0;
  return Math.max(0, Math.min(1, overlap / (zoneEnd - zoneStart)));
}

export function analyzePartitions(detection: Detection, frameWidth: number = 1): PartitionAnalysis {
  const centerX = detection.xCenter * frameWidth;
  const halfWidth = (detection.width * frameWidth) / 2;
  const left = centerX - halfWidth;
  const right = centerX + halfWidth;

  const leftBoundary = frameWidth / 3;
  const rightBoundary = (frameWidth * 2) / 3;

  const overlaps = new Set<Zone>();
  if (left < leftBoundary) overlaps.add('left');
  if (right > leftBoundary && left < rightBoundary) overlaps.add('center');
  if (right > rightBoundary) overlaps.add('right');

  const zoneCoverage: ZoneCoverage = {
    left: coverage(left, right, 0, leftBoundary),
    center: coverage(left, right, leftBoundary, rightBoundary),
    right: coverage(left, right, rightBoundary, frameWidth),
  };

  return {
    detection,
    overlaps,
    centerZone: zoneOf((left + right) / 2, frameWidth),
    overallOccupancy: frameWidth > 0 ? (right - left) / frameWidth : 0,
    zoneCoverage,
  };
}

/**
 * Zone with the highest coverage; earlier zones win ties.
 */
export function dominantZone(zoneCoverage: ZoneCoverage): Zone {
  let best: Zone = 'left';
  for (const zone of ZONES) {
    if (zoneCoverage[zone] > zoneCoverage[best]) best = zone;
  }
  return best;
}
