// Navigation types for obstacle guidance

// ====================
// Detection Types
// ====================

/**
 * One object reported by the detector for a single frame.
 * Geometry is normalized to the frame: 0 = left/top edge, 1 = right/bottom edge.
 */
export interface Detection {
  readonly label: string;
  readonly confidence: number;  // 0-1
  readonly xCenter: number;
  readonly yCenter: number;
  readonly width: number;
  readonly height: number;
  readonly distanceMeters?: number;  // unknown when depth is unavailable
}

/**
 * Detector output before normalization. Values may fall outside [0, 1].
 */
export interface RawDetection {
  label: string;
  confidence: number;
  xCenter: number;
  yCenter: number;
  width: number;
  height: number;
  distanceMeters?: number | null;
}

export interface PixelBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Detector output in pixel space (e.g. straight from an SSD/YOLO head).
 */
export interface PixelDetection {
  label?: string;
  score?: number;
  box: PixelBox;
}

export interface DepthMap {
  width: number;
  height: number;
  data: ArrayLike<number>;  // row-major relative depth values
}

// ====================
// Spatial Types
// ====================

export type Zone = 'left' | 'center' | 'right';

// User-facing label for the same partition as Zone
export type Direction = Zone;

export interface ZoneCoverage {
  left: number;
  center: number;
  right: number;
}

export interface PartitionAnalysis {
  detection: Detection;
  overlaps: ReadonlySet<Zone>;
  centerZone: Zone;
  overallOccupancy: number;
  zoneCoverage: ZoneCoverage;
}

export type DistanceCategory = 'far' | 'medium' | 'close' | 'very_close';

// Least to most dangerous
export const DISTANCE_CATEGORY_ORDER: readonly DistanceCategory[] = [
  'far',
  'medium',
  'close',
  'very_close',
];

// ====================
// Decision Types
// ====================

export type NavigationDecision =
  | 'stop'
  | 'step_left'
  | 'step_right'
  | 'go_straight';

// step_left and step_right collapse into 'lateral' for change detection
export type DecisionCategory = 'stop' | 'lateral' | 'straight';

export interface DecisionResult {
  decision: NavigationDecision;
  distanceMeters: number;
  occupancy: number;
  objectLabel: string;
  zoneCoverage: ZoneCoverage;
}

export interface Guidance {
  label: string;
  direction: Direction;
  distanceCategory: DistanceCategory;
  priority: number;
}

export type StrategyName = 'partition' | 'legacy';

// ====================
// Gate Types
// ====================

export interface PartitionGateState {
  lastSpeechAt: number | null;
  lastDecisionCategory: DecisionCategory | null;
  lastSpokenDistance: number | null;
  lastSpokenOccupancy: number | null;
  lastSpokenObjectLabel: string | null;
  lastPathClearAt: number | null;  // null = not announced since the last obstacle
}

export type PartitionSpeakTrigger = 'object_changed' | 'urgent_repeat' | 'repeat' | 'path_clear';

export type PartitionSkipReason = 'min_interval' | 'no_change' | 'path_clear_interval';

export type GateVerdict =
  | { speak: true; trigger: PartitionSpeakTrigger }
  | { speak: false; reason: PartitionSkipReason };

export interface LegacyGateState {
  lastGlobalAt: number | null;
  labelAt: Map<string, number>;
  labelDirectionAt: Map<string, number>;
  labelDistance: Map<string, DistanceCategory>;
}

export type LegacySuppressReason =
  | 'global_cooldown'
  | 'far'
  | 'medium_off_center'
  | 'too_small'
  | 'frame_edge'
  | 'label_cooldown'
  | 'direction_cooldown'
  | 'not_approaching';

export type LegacyVerdict =
  | { allowed: true }
  | { allowed: false; reason: LegacySuppressReason };

// ====================
// Speech Types
// ====================

export type SpeechPriority = 'urgent' | 'navigation' | 'information';

export type AnnouncementSource =
  | 'navigation'
  | 'path_clear'
  | 'legacy'
  | 'closest_object'
  | 'scene';

export interface SpeechRequest {
  id: string;
  text: string;
  priority: SpeechPriority;
  interrupt: boolean;
  source: AnnouncementSource;
  requestedAt: number;  // epoch ms
}

/**
 * The audio output. Resolves when the request has been spoken (or dropped by a flush).
 */
export interface SpeechSink {
  speak(request: SpeechRequest): Promise<void>;
}

// ====================
// Session Types
// ====================

export interface Frame {
  detections: RawDetection[];
  frameWidth?: number;  // any unit; defaults to normalized width 1
  depthMap?: DepthMap;
}

export interface FrameOutcome {
  strategy: StrategyName;
  detections: Detection[];
  announcement: SpeechRequest | null;
  narration: SpeechRequest | null;
}

export type Clock = () => number;
