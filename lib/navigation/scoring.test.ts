import { describe, it, expect } from 'vitest';
import type { Detection } from '@/types/navigation';
import {
  directionOf,
  distanceCategoryFromMeters,
  distanceCategoryFromWidth,
  distanceCategoryOf,
  isGuidanceCandidate,
  priorityOf,
  selectGuidance,
  toGuidance,
} from './scoring';
import { DEFAULT_GUIDANCE_CONFIG, resolveGuidanceConfig } from './config';

const legacy = DEFAULT_GUIDANCE_CONFIG.legacy;
const minConfidence = DEFAULT_GUIDANCE_CONFIG.filter.minConfidence;

function detection(overrides: Partial<Detection> = {}): Detection {
  return {
    label: 'chair',
    confidence: 0.9,
    xCenter: 0.5,
    yCenter: 0.7,
    width: 0.2,
    height: 0.3,
    ...overrides,
  };
}

describe('isGuidanceCandidate', () => {
  it('accepts a confident, low, large enough object', () => {
    expect(isGuidanceCandidate(detection(), legacy, minConfidence)).toBe(true);
  });

  it('rejects weak, high or tiny detections', () => {
    expect(isGuidanceCandidate(detection({ confidence: 0.3 }), legacy, minConfidence)).toBe(false);
    expect(isGuidanceCandidate(detection({ yCenter: 0.4 }), legacy, minConfidence)).toBe(false);
    expect(isGuidanceCandidate(detection({ width: 0.04 }), legacy, minConfidence)).toBe(false);
  });

  it('rejects stoplisted labels by substring, ignoring case', () => {
    expect(isGuidanceCandidate(detection({ label: 'Cell Phone' }), legacy, minConfidence)).toBe(false);
    expect(isGuidanceCandidate(detection({ label: 'coffee cup' }), legacy, minConfidence)).toBe(false);
    expect(isGuidanceCandidate(detection({ label: 'person' }), legacy, minConfidence)).toBe(true);
  });
});

describe('directionOf', () => {
  it('uses fixed thirds with inclusive center bounds', () => {
    expect(directionOf(0.2)).toBe('left');
    expect(directionOf(0.33)).toBe('center');
    expect(directionOf(0.66)).toBe('center');
    expect(directionOf(0.7)).toBe('right');
  });
});

describe('distance categories', () => {
  it('buckets meters with exclusive upper bounds', () => {
    expect(distanceCategoryFromMeters(0.5, legacy)).toBe('very_close');
    expect(distanceCategoryFromMeters(1.0, legacy)).toBe('close');
    expect(distanceCategoryFromMeters(3.9, legacy)).toBe('medium');
    expect(distanceCategoryFromMeters(4.0, legacy)).toBe('far');
  });

  it('estimates from box width', () => {
    expect(distanceCategoryFromWidth(0.7)).toBe('very_close');
    expect(distanceCategoryFromWidth(0.35)).toBe('close');
    expect(distanceCategoryFromWidth(0.2)).toBe('medium');
    expect(distanceCategoryFromWidth(0.05)).toBe('far');
  });

  it('treats a missing distance as far unless size estimation is on', () => {
    const wide = detection({ width: 0.7 });
    const sizeBased = resolveGuidanceConfig({ legacy: { sizeBasedDistance: true } }).legacy;

    expect(distanceCategoryOf(wide, legacy)).toBe('far');
    expect(distanceCategoryOf(wide, sizeBased)).toBe('very_close');
    expect(distanceCategoryOf({ ...wide, distanceMeters: 3 }, sizeBased)).toBe('medium');
  });
});

describe('priorityOf', () => {
  it('weights confidence, distance and direction', () => {
    expect(priorityOf(detection({ confidence: 0.5, distanceMeters: 2 }), 'center')).toBe(20);
    expect(priorityOf(detection({ confidence: 0.5 }), 'left')).toBe(3.5);
    expect(priorityOf(detection({ confidence: 1, distanceMeters: 0.05 }), 'center')).toBe(306);
  });
});

describe('selectGuidance', () => {
  it('returns the highest-priority candidate', () => {
    const near = detection({ label: 'person', distanceMeters: 1.5 });
    const result = selectGuidance(
      [detection({ label: 'table', xCenter: 0.2, distanceMeters: 3 }), near],
      legacy,
      minConfidence
    );

    expect(result?.detection).toBe(near);
    expect(result?.guidance).toEqual({
      label: 'person',
      direction: 'center',
      distanceCategory: 'close',
      priority: toGuidance(near, legacy).priority,
    });
  });

  it('keeps the first candidate on a tie', () => {
    const result = selectGuidance(
      [detection({ label: 'first', distanceMeters: 2 }), detection({ label: 'second', distanceMeters: 2 })],
      legacy,
      minConfidence
    );
    expect(result?.guidance.label).toBe('first');
  });

  it('returns null when nothing qualifies', () => {
    expect(selectGuidance([detection({ label: 'bottle' })], legacy, minConfidence)).toBeNull();
  });
});
