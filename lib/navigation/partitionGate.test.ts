import { describe, it, expect, beforeEach } from 'vitest';
import type { DecisionResult, NavigationDecision } from '@/types/navigation';
import { PartitionGate, createPartitionGateState } from './partitionGate';
import { DEFAULT_GUIDANCE_CONFIG } from './config';

function result(
  decision: NavigationDecision,
  objectLabel: string,
  distanceMeters: number,
  occupancy: number
): DecisionResult {
  return {
    decision,
    distanceMeters,
    occupancy,
    objectLabel,
    zoneCoverage: { left: 0, center: occupancy, right: 0 },
  };
}

describe('PartitionGate', () => {
  let gate: PartitionGate;

  beforeEach(() => {
    gate = new PartitionGate(DEFAULT_GUIDANCE_CONFIG.announcement);
  });

  it('speaks the first decision as an object change', () => {
    expect(gate.evaluate(result('step_right', 'chair', 2, 0.2), 0)).toEqual({ speak: true, trigger: 'object_changed' });
    expect(gate.snapshot()).toMatchObject({
      lastSpeechAt: 0,
      lastDecisionCategory: 'lateral',
      lastSpokenDistance: 2,
      lastSpokenOccupancy: 0.2,
      lastSpokenObjectLabel: 'chair',
    });
  });

  it('enforces the minimum gap even when the object changes', () => {
    gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_left', 'table', 1.5, 0.3), 1500)).toEqual({ speak: false, reason: 'min_interval' });
  });

  it('stays quiet for the same object before the repeat interval', () => {
    gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_right', 'chair', 1, 0.5), 3000)).toEqual({ speak: false, reason: 'no_change' });
  });

  it('does not chatter when the lateral choice flips', () => {
    gate.evaluate(result('step_left', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_right', 'chair', 2, 0.2), 2500)).toEqual({ speak: false, reason: 'no_change' });
  });

  it('repeats once the interval passed and the distance moved', () => {
    gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_right', 'chair', 1.4, 0.2), 6000)).toEqual({ speak: true, trigger: 'repeat' });
  });

  it('repeats when only the occupancy moved', () => {
    gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_right', 'chair', 2, 0.35), 6000)).toEqual({ speak: true, trigger: 'repeat' });
  });

  it('holds back a repeat when nothing moved enough', () => {
    gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
    expect(gate.evaluate(result('step_right', 'chair', 1.8, 0.25), 6000)).toEqual({ speak: false, reason: 'no_change' });
  });

  it('repeats a stop on the shorter urgent interval', () => {
    gate.evaluate(result('stop', 'wall', 1.0, 0.8), 0);
    expect(gate.evaluate(result('stop', 'wall', 0.4, 0.8), 2000)).toEqual({ speak: true, trigger: 'urgent_repeat' });
  });

  it('never speaks twice within the minimum gap under churn', () => {
    const spokenAt: number[] = [];
    const labels = ['chair', 'table', 'person'];

    for (let t = 0, i = 0; t <= 20000; t += 100, i++) {
      const verdict = gate.evaluate(result(i % 4 === 0 ? 'stop' : 'step_left', labels[i % 3], 0.5 + (i % 7) * 0.3, 0.7), t);
      if (verdict.speak) spokenAt.push(t);
    }

    expect(spokenAt.length).toBeGreaterThan(1);
    for (let k = 1; k < spokenAt.length; k++) {
      expect(spokenAt[k] - spokenAt[k - 1]).toBeGreaterThanOrEqual(2000);
    }
  });

  describe('path clear', () => {
    it('announces twice across ten clear frames spanning nine seconds', () => {
      const spokenAt: number[] = [];
      for (let t = 0; t <= 9000; t += 1000) {
        if (gate.evaluateClear(t).speak) spokenAt.push(t);
      }
      expect(spokenAt).toEqual([0, 8000]);
    });

    it('skips inside the repeat interval', () => {
      gate.evaluateClear(0);
      expect(gate.evaluateClear(2000)).toEqual({ speak: false, reason: 'path_clear_interval' });
    });

    it('announces again as soon as an obstacle has come and gone', () => {
      expect(gate.evaluateClear(0).speak).toBe(true);
      expect(gate.evaluate(result('step_right', 'chair', 2, 0.2), 3000).speak).toBe(true);
      expect(gate.evaluateClear(5000)).toEqual({ speak: true, trigger: 'path_clear' });
    });

    it('counts the next obstacle as a new object', () => {
      gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
      gate.evaluateClear(2000);
      expect(gate.evaluate(result('step_right', 'chair', 2, 0.2), 4000)).toEqual({ speak: true, trigger: 'object_changed' });
    });

    it('respects the minimum gap after a decision', () => {
      gate.evaluate(result('step_right', 'chair', 2, 0.2), 0);
      expect(gate.evaluateClear(1000)).toEqual({ speak: false, reason: 'min_interval' });
    });
  });

  it('forgets everything on reset', () => {
    gate.evaluate(result('stop', 'wall', 0.5, 0.9), 0);
    gate.reset();
    expect(gate.snapshot()).toEqual(createPartitionGateState());
    expect(gate.evaluate(result('stop', 'wall', 0.5, 0.9), 100).speak).toBe(true);
  });
});
