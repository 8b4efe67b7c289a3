import { describe, it, expect } from 'vitest';
import type { Detection } from '@/types/navigation';
import { analyzePartitions, dominantZone, zoneOf } from './partition';

function detection(xCenter: number, width: number): Detection {
  return { label: 'table', confidence: 0.9, xCenter, yCenter: 0.5, width, height: 0.5, distanceMeters: 1.5 };
}

describe('zoneOf', () => {
  it('splits the frame into equal thirds', () => {
    expect(zoneOf(0.2)).toBe('left');
    expect(zoneOf(1 / 3)).toBe('center');
    expect(zoneOf(0.5)).toBe('center');
    expect(zoneOf(0.9)).toBe('right');
    expect(zoneOf(250, 1000)).toBe('left');
    expect(zoneOf(700, 1000)).toBe('right');
  });
});

describe('analyzePartitions', () => {
  it('measures a box covering the left half of a pixel-wide frame', () => {
    const analysis = analyzePartitions(detection(0.25, 0.5), 1000);

    expect([...analysis.overlaps]).toEqual(['left', 'center']);
    expect(analysis.centerZone).toBe('left');
    expect(analysis.overallOccupancy).toBeCloseTo(0.5);
    expect(analysis.zoneCoverage.left).toBeCloseTo(1);
    expect(analysis.zoneCoverage.center).toBeCloseTo(0.5);
    expect(analysis.zoneCoverage.right).toBe(0);
  });

  it('gives the same ratios on a normalized frame', () => {
    const analysis = analyzePartitions(detection(0.25, 0.5));
    expect(analysis.overallOccupancy).toBeCloseTo(0.5);
    expect(analysis.zoneCoverage.left).toBeCloseTo(1);
    expect(analysis.zoneCoverage.center).toBeCloseTo(0.5);
  });

  it('covers all three zones for a full-width box', () => {
    const analysis = analyzePartitions(detection(0.5, 1));

    expect(analysis.overlaps.size).toBe(3);
    expect(analysis.overallOccupancy).toBe(1);
    expect(analysis.zoneCoverage).toEqual({ left: 1, center: 1, right: 1 });
  });

  it('handles a zero-width box', () => {
    const analysis = analyzePartitions(detection(0.5, 0));

    expect(analysis.overallOccupancy).toBe(0);
    expect(analysis.centerZone).toBe('center');
    expect(analysis.zoneCoverage).toEqual({ left: 0, center: 0, right: 0 });
  });

  it('keeps the detection it analyzed', () => {
    const input = detection(0.8, 0.1);
    expect(analyzePartitions(input).detection).toBe(input);
  });
});

describe('dominantZone', () => {
  it('picks the most covered zone', () => {
    expect(dominantZone({ left: 0.1, center: 0.2, right: 0.9 })).toBe('right');
  });

  it('prefers the earlier zone on a tie', () => {
    expect(dominantZone({ left: 0.2, center: 0.5, right: 0.5 })).toBe('center');
    expect(dominantZone({ left: 0, center: 0, right: 0 })).toBe('left');
  });
});
