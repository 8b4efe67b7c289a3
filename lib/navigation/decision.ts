import type {
  DecisionResult,
  Detection,
  NavigationDecision,
  PartitionAnalysis,
} from '@/types/navigation';
import type { FilterConfig, PartitionConfig } from './config';

/**
 * Partition-based Decision Engine
 *
 * Pure functions: detections in, at most one decision out. Whether that
 * decision is spoken is the announcement gate's business.
 */

/**
 * Detections worth steering around: confident enough, with a known distance
 * inside the navigation horizon.
 */
export function selectNavigable(detections: Detection[], config: FilterConfig): Detection[] {
  return detections.filter(
    (d) =>
      d.confidence >= config.minConfidence &&
      d.distanceMeters !== undefined &&
      d.distanceMeters <= config.navigationHorizonMeters
  );
}

/**
 * Closest analysis by distance. On equal distance the first one wins.
 */
export function findClosest(analyses: PartitionAnalysis[]): PartitionAnalysis | null {
  let closest: PartitionAnalysis | null = null;
  let closestDistance = Infinity;

  for (const analysis of analyses) {
    const distance = analysis.detection.distanceMeters ?? Infinity;
    if (closest === null || distance < closestDistance) {
      closest = analysis;
      closestDistance = distance;
    }
  }

  return closest;
}

/**
 * Step toward the side with less total coverage across all detections.
 * Equal sides resolve to step_right.
 */
export function chooseLateral(analyses: PartitionAnalysis[]): NavigationDecision {
  let leftOccupancy = 0;
  let rightOccupancy = 0;

  for (const analysis of analyses) {
    if (analysis.overlaps.has('left')) leftOccupancy += analysis.zoneCoverage.left;
    if (analysis.overlaps.has('right')) rightOccupancy += analysis.zoneCoverage.right;
  }

  if (leftOccupancy < rightOccupancy) return 'step_left';
  return 'step_right';
}

export function decide(
  analyses: PartitionAnalysis[],
  config: PartitionConfig
): DecisionResult | null {
  const closest = findClosest(analyses);
  if (!closest) return null;

  const distance = closest.detection.distanceMeters;
  if (distance === undefined) return null;

  const occupancy = closest.overallOccupancy;
  const result = (decision: NavigationDecision): DecisionResult => ({
    decision,
    distanceMeters: distance,
    occupancy,
    objectLabel: closest.detection.label,
    zoneCoverage: closest.zoneCoverage,
  });

  // 1. Blocked and about to walk into it
  if (occupancy >= config.fullBlockOccupancy && distance <= config.stopDistanceMeters) {
    return result('stop');
  }

  // 2. Large object within alert range
  if (occupancy >= config.largeObjectOccupancy && distance <= config.alertDistanceMeters) {
    return result(chooseLateral(analyses));
  }

  // 3. Side obstacles leave the forward path open; a centered one does not
  switch (closest.centerZone) {
    case 'left':
    case 'right':
      return result('go_straight');
    case 'center':
      return result(chooseLateral(analyses));
  }
}
