import type {
  DecisionCategory,
  Direction,
  DistanceCategory,
  Guidance,
  NavigationDecision,
} from '@/types/navigation';

/**
 * Spoken text for decisions and guidance.
 *
 * Kept short for TTS: the label first, then what to do. Distances are left out
 * of navigation phrases since they change every frame.
 */

export const PATH_CLEAR_SPEECH = 'path clear, move straight';

export function isUrgent(decision: NavigationDecision): boolean {
  return decision === 'stop';
}

export function decisionCategory(decision: NavigationDecision): DecisionCategory {
  switch (decision) {
    case 'stop':
      return 'stop';
    case 'step_left':
    case 'step_right':
      return 'lateral';
    case 'go_straight':
      return 'straight';
  }
}

function decisionAction(decision: NavigationDecision): string {
  switch (decision) {
    case 'stop':
      return 'stop';
    case 'step_left':
      return 'move left';
    case 'step_right':
      return 'move right';
    case 'go_straight':
      return 'move straight';
  }
}

/**
 * e.g. "chair ahead of you, move right"
 */
export function decisionSpeech(decision: NavigationDecision, label: string): string {
  return `${label} ahead of you, ${decisionAction(decision)}`;
}

export function directionPhrase(direction: Direction): string {
  switch (direction) {
    case 'center':
      return 'ahead';
    case 'left':
      return 'to your left';
    case 'right':
      return 'to your right';
  }
}

function distancePhrase(category: DistanceCategory): string {
  switch (category) {
    case 'very_close':
      return 'very close, stop';
    case 'close':
      return 'close, slow down';
    case 'medium':
      return 'approaching';
    case 'far':
      return 'in the distance';
  }
}

/**
 * e.g. "person to your left, close, slow down"
 */
export function guidanceSpeech(guidance: Guidance): string {
  return `${guidance.label} ${directionPhrase(guidance.direction)}, ${distancePhrase(guidance.distanceCategory)}`;
}

/**
 * e.g. "chair, about 1.4 meters to your left"
 */
export function closestObjectSpeech(label: string, meters: number, direction: Direction): string {
  return `${label}, about ${meters.toFixed(1)} meters ${directionPhrase(direction)}`;
}
