import type {
  Detection,
  DepthMap,
  PixelDetection,
  RawDetection,
} from '@/types/navigation';
import type { DepthConfig } from './config';

/**
 * Detection Normalizer
 *
 * Everything downstream assumes geometry and confidence in [0, 1] and a
 * distance that is either a finite non-negative number or absent.
 * Out-of-range input is clamped here rather than rejected.
 */

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

function normalizeDistance(distance: number | null | undefined): number | undefined {
  if (distance === null || distance === undefined) return undefined;
  if (!Number.isFinite(distance) || distance < 0) return undefined;
  return distance;
}

export function normalizeDetection(raw: RawDetection): Detection {
  const label = raw.label.trim() || 'unknown';
  const distanceMeters = normalizeDistance(raw.distanceMeters);

  return {
    label,
    confidence: clamp01(raw.confidence),
    xCenter: clamp01(raw.xCenter),
    yCenter: clamp01(raw.yCenter),
    width: clamp01(raw.width),
    height: clamp01(raw.height),
    ...(distanceMeters !== undefined ? { distanceMeters } : {}),
  };
}

export function normalizeDetections(raws: RawDetection[]): Detection[] {
  return raws.map(normalizeDetection);
}

/**
 * Convert a pixel-space bounding box into the normalized center form.
 */
export function fromPixelDetection(
  pixel: PixelDetection,
  imageWidth: number,
  imageHeight: number
): Detection {
  const { left, top, right, bottom } = pixel.box;
  const safeWidth = imageWidth > 0 ? imageWidth : 1;
  const safeHeight = imageHeight > 0 ? imageHeight : 1;

  return normalizeDetection({
    label: pixel.label ?? 'unknown',
    confidence: pixel.score ?? 0,
    xCenter: (left + right) / 2 / safeWidth,
    yCenter: (top + bottom) / 2 / safeHeight,
    width: (right - left) / safeWidth,
    height: (bottom - top) / safeHeight,
  });
}

// ====================
// Depth enrichment
// ====================

/**
 * Median of the depth values under a detection's box, or null when the map
 * has no samples there.
 */
export function medianDepthForRegion(depthMap: DepthMap, detection: Detection): number | null {
  const { width, height, data } = depthMap;
  if (width <= 0 || height <= 0) return null;

  const boxLeft = clamp01(detection.xCenter - detection.width / 2);
  const boxRight = clamp01(detection.xCenter + detection.width / 2);
  const boxTop = clamp01(detection.yCenter - detection.height / 2);
  const boxBottom = clamp01(detection.yCenter + detection.height / 2);

  const left = Math.min(width - 1, Math.floor(boxLeft * width));
  const right = Math.min(width - 1, Math.floor(boxRight * width));
  const top = Math.min(height - 1, Math.floor(boxTop * height));
  const bottom = Math.min(height - 1, Math.floor(boxBottom * height));

  const values: number[] = [];
  for (let y = top; y <= bottom; y++) {
    for (let x = left; x <= right; x++) {
      const index = y * width + x;
      if (index < data.length && Number.isFinite(data[index])) {
        values.push(data[index]);
      }
    }
  }

  if (values.length === 0) return null;

  values.sort((a, b) => a - b);
  const mid = Math.floor(values.length / 2);
  return values.length % 2 === 0 ? (values[mid - 1] + values[mid]) / 2 : values[mid];
}

/**
 * Relative depth to meters: depth / scaleFactor, clamped to the configured range.
 */
export function depthToMeters(relativeDepth: number, config: DepthConfig): number {
  const meters = relativeDepth / config.scaleFactor;
  return Math.max(config.minMeters, Math.min(config.maxMeters, meters));
}

/**
 * Fill in distanceMeters from a depth map. Detections that already carry a
 * distance keep it; those with no depth samples stay unknown.
 */
export function attachDepth(
  detections: Detection[],
  depthMap: DepthMap,
  config: DepthConfig
): Detection[] {
  return detections.map((detection) => {
    if (detection.distanceMeters !== undefined) return detection;

    const depth = medianDepthForRegion(depthMap, detection);
    if (depth === null) return detection;

    return { ...detection, distanceMeters: depthToMeters(depth, config) };
  });
}

export function describeDepthCoverage(detections: Detection[]): string {
  const total = detections.length;
  const withDepth = detections.filter((d) => d.distanceMeters !== undefined).length;
  const percentage = total > 0 ? Math.floor((withDepth * 100) / total) : 0;
  return `Depth coverage: ${withDepth}/${total} (${percentage}%) detections have distance`;
}
