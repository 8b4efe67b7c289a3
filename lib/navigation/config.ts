import type { StrategyName } from '@/types/navigation';
import type { Logger } from '../logger';
import { createLogger } from '../logger';

/**
 * Guidance configuration
 *
 * Every threshold the pipeline uses lives here, grouped by the component that
 * reads it. Distances are meters, durations milliseconds, fractions 0-1.
 */

export interface FilterConfig {
  minConfidence: number;
  navigationHorizonMeters: number;
}

export interface PartitionConfig {
  fullBlockOccupancy: number;
  largeObjectOccupancy: number;
  stopDistanceMeters: number;
  alertDistanceMeters: number;
}

export interface AnnouncementConfig {
  urgentRepeatMs: number;
  nonUrgentRepeatMs: number;
  pathClearRepeatMs: number;
  minInterSpeechMs: number;
  distanceDeltaMeters: number;
  occupancyDelta: number;
}

export interface LegacyConfig {
  minYCenter: number;
  minWidth: number;
  stoplist: string[];
  sizeBasedDistance: boolean;
  veryCloseMeters: number;
  closeMeters: number;
  mediumMeters: number;
  globalCooldownMs: number;
  labelCooldownMs: number;
  directionCooldownMs: number;
  minAnnounceWidth: number;
  edgeMargin: number;
  mediumPriorityFloor: number;
}

export interface DepthConfig {
  scaleFactor: number;
  minMeters: number;
  maxMeters: number;
}

export interface ClosestObjectConfig {
  enabled: boolean;
  minConfidence: number;
  smoothingAlpha: number;
  distanceChangeMeters: number;
  cooldownMs: number;
}

export interface SceneConfig {
  cooldownMs: number;
  model: string;
}

export interface SpeechConfig {
  suppressionWindowMs: number;
}

export interface GuidanceConfig {
  filter: FilterConfig;
  partition: PartitionConfig;
  announcement: AnnouncementConfig;
  legacy: LegacyConfig;
  depth: DepthConfig;
  closestObject: ClosestObjectConfig;
  scene: SceneConfig;
  speech: SpeechConfig;
}

export type GuidanceConfigOverrides = {
  [K in keyof GuidanceConfig]?: Partial<GuidanceConfig[K]>;
};

// Small handheld objects are never navigation-relevant
const DEFAULT_STOPLIST = [
  'book',
  'bottle',
  'cup',
  'keyboard',
  'mouse',
  'laptop',
  'charger',
  'cell phone',
  'remote',
];

export const DEFAULT_GUIDANCE_CONFIG: GuidanceConfig = {
  filter: {
    minConfidence: 0.4,
    navigationHorizonMeters: 3.5,
  },
  partition: {
    fullBlockOccupancy: 0.6,
    largeObjectOccupancy: 0.4,
    stopDistanceMeters: 1.0,
    alertDistanceMeters: 2.5,
  },
  announcement: {
    urgentRepeatMs: 1200,
    nonUrgentRepeatMs: 5000,
    pathClearRepeatMs: 8000,
    minInterSpeechMs: 2000,
    distanceDeltaMeters: 0.5,
    occupancyDelta: 0.1,
  },
  legacy: {
    minYCenter: 0.5,
    minWidth: 0.05,
    stoplist: DEFAULT_STOPLIST,
    sizeBasedDistance: false,
    veryCloseMeters: 1.0,
    closeMeters: 2.0,
    mediumMeters: 4.0,
    globalCooldownMs: 2500,
    labelCooldownMs: 5000,
    directionCooldownMs: 3000,
    minAnnounceWidth: 0.08,
    edgeMargin: 0.05,
    mediumPriorityFloor: 10,
  },
  depth: {
    scaleFactor: 150,
    minMeters: 0.1,
    maxMeters: 10,
  },
  closestObject: {
    enabled: true,
    minConfidence: 0.4,
    smoothingAlpha: 0.35,
    distanceChangeMeters: 0.3,
    cooldownMs: 1200,
  },
  scene: {
    cooldownMs: 5000,
    model: 'gemini-1.5-flash',
  },
  speech: {
    suppressionWindowMs: 1500,
  },
};

export class GuidanceConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid guidance config: ${issues.join('; ')}`);
    this.name = 'GuidanceConfigError';
    this.issues = issues;
  }
}

function isFraction(v: number): boolean {
  return Number.isFinite(v) && v >= 0 && v <= 1;
}

function isNonNegative(v: number): boolean {
  return Number.isFinite(v) && v >= 0;
}

function validate(config: GuidanceConfig): string[] {
  const issues: string[] = [];
  const { filter, partition, announcement, legacy, depth, closestObject, speech } = config;

  const fractions: Array<[string, number]> = [
    ['filter.minConfidence', filter.minConfidence],
    ['partition.fullBlockOccupancy', partition.fullBlockOccupancy],
    ['partition.largeObjectOccupancy', partition.largeObjectOccupancy],
    ['announcement.occupancyDelta', announcement.occupancyDelta],
    ['legacy.minYCenter', legacy.minYCenter],
    ['legacy.minWidth', legacy.minWidth],
    ['legacy.minAnnounceWidth', legacy.minAnnounceWidth],
    ['legacy.edgeMargin', legacy.edgeMargin],
    ['closestObject.minConfidence', closestObject.minConfidence],
    ['closestObject.smoothingAlpha', closestObject.smoothingAlpha],
  ];
  for (const [name, value] of fractions) {
    if (!isFraction(value)) issues.push(`${name} must be within [0, 1] (got ${value})`);
  }

  const nonNegatives: Array<[string, number]> = [
    ['filter.navigationHorizonMeters', filter.navigationHorizonMeters],
    ['partition.stopDistanceMeters', partition.stopDistanceMeters],
    ['partition.alertDistanceMeters', partition.alertDistanceMeters],
    ['announcement.urgentRepeatMs', announcement.urgentRepeatMs],
    ['announcement.nonUrgentRepeatMs', announcement.nonUrgentRepeatMs],
    ['announcement.pathClearRepeatMs', announcement.pathClearRepeatMs],
    ['announcement.minInterSpeechMs', announcement.minInterSpeechMs],
    ['announcement.distanceDeltaMeters', announcement.distanceDeltaMeters],
    ['legacy.globalCooldownMs', legacy.globalCooldownMs],
    ['legacy.labelCooldownMs', legacy.labelCooldownMs],
    ['legacy.directionCooldownMs', legacy.directionCooldownMs],
    ['legacy.mediumPriorityFloor', legacy.mediumPriorityFloor],
    ['depth.minMeters', depth.minMeters],
    ['closestObject.distanceChangeMeters', closestObject.distanceChangeMeters],
    ['closestObject.cooldownMs', closestObject.cooldownMs],
    ['scene.cooldownMs', config.scene.cooldownMs],
    ['speech.suppressionWindowMs', speech.suppressionWindowMs],
  ];
  for (const [name, value] of nonNegatives) {
    if (!isNonNegative(value)) issues.push(`${name} must be a non-negative number (got ${value})`);
  }

  if (partition.largeObjectOccupancy > partition.fullBlockOccupancy) {
    issues.push('partition.largeObjectOccupancy must not exceed partition.fullBlockOccupancy');
  }
  if (partition.stopDistanceMeters > partition.alertDistanceMeters) {
    issues.push('partition.stopDistanceMeters must not exceed partition.alertDistanceMeters');
  }
  if (!(legacy.veryCloseMeters < legacy.closeMeters && legacy.closeMeters < legacy.mediumMeters)) {
    issues.push('legacy distance thresholds must increase: veryCloseMeters < closeMeters < mediumMeters');
  }
  if (!(depth.scaleFactor > 0)) {
    issues.push(`depth.scaleFactor must be positive (got ${depth.scaleFactor})`);
  }
  if (!(depth.minMeters < depth.maxMeters)) {
    issues.push('depth.minMeters must be below depth.maxMeters');
  }
  if (!config.scene.model.trim()) {
    issues.push('scene.model must not be empty');
  }

  return issues;
}

/**
 * Merge overrides onto the defaults section by section and validate the result.
 * Throws GuidanceConfigError listing every invalid field.
 */
export function resolveGuidanceConfig(
  overrides: GuidanceConfigOverrides = {},
  base: GuidanceConfig = DEFAULT_GUIDANCE_CONFIG
): GuidanceConfig {
  const config: GuidanceConfig = {
    filter: { ...base.filter, ...overrides.filter },
    partition: { ...base.partition, ...overrides.partition },
    announcement: { ...base.announcement, ...overrides.announcement },
    legacy: { ...base.legacy, ...overrides.legacy },
    depth: { ...base.depth, ...overrides.depth },
    closestObject: { ...base.closestObject, ...overrides.closestObject },
    scene: { ...base.scene, ...overrides.scene },
    speech: { ...base.speech, ...overrides.speech },
  };
  config.legacy.stoplist = config.legacy.stoplist.map((label) => label.toLowerCase().trim());

  const issues = validate(config);
  if (issues.length > 0) {
    throw new GuidanceConfigError(issues);
  }
  return config;
}

export interface EnvironmentSettings {
  config: GuidanceConfig;
  strategy: StrategyName;
  debug: boolean;
  geminiApiKey: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, logger: Logger): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`Ignoring ${key}=${raw}, not a number`);
    return undefined;
  }
  return value;
}

function readBool(env: Env, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw === 'true';
}

/**
 * Load settings from GUIDANCE_* environment variables and GEMINI_API_KEY.
 */
export function loadGuidanceConfigFromEnv(
  env: Env = process.env,
  logger: Logger = createLogger('GuidanceConfig')
): EnvironmentSettings {
  const rawStrategy = env.GUIDANCE_STRATEGY;
  let strategy: StrategyName = 'partition';
  if (rawStrategy === 'legacy' || rawStrategy === 'partition') {
    strategy = rawStrategy;
  } else if (rawStrategy) {
    logger.warn(`Unknown GUIDANCE_STRATEGY=${rawStrategy}, using partition`);
  }

  const overrides: GuidanceConfigOverrides = { filter: {}, depth: {}, speech: {}, closestObject: {}, scene: {} };
  const minConfidence = readNumber(env, 'GUIDANCE_MIN_CONFIDENCE', logger);
  if (minConfidence !== undefined) overrides.filter = { ...overrides.filter, minConfidence };
  const horizon = readNumber(env, 'GUIDANCE_HORIZON_METERS', logger);
  if (horizon !== undefined) overrides.filter = { ...overrides.filter, navigationHorizonMeters: horizon };
  const scaleFactor = readNumber(env, 'GUIDANCE_DEPTH_SCALE', logger);
  if (scaleFactor !== undefined) overrides.depth = { scaleFactor };
  const suppression = readNumber(env, 'GUIDANCE_SUPPRESSION_MS', logger);
  if (suppression !== undefined) overrides.speech = { suppressionWindowMs: suppression };
  const closestObject = readBool(env, 'GUIDANCE_CLOSEST_OBJECT');
  if (closestObject !== undefined) overrides.closestObject = { enabled: closestObject };
  if (env.GUIDANCE_SCENE_MODEL) overrides.scene = { model: env.GUIDANCE_SCENE_MODEL };

  const config = resolveGuidanceConfig(overrides);

  return {
    config,
    strategy,
    debug: readBool(env, 'GUIDANCE_DEBUG') ?? false,
    geminiApiKey: env.GEMINI_API_KEY || '',
  };
}
