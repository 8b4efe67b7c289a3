import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerativeModel } from '@google/generative-ai';
import type { Clock, Detection, SpeechRequest, Zone } from '@/types/navigation';
import type { SceneConfig } from '../navigation/config';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { zoneOf } from '../navigation/partition';
import type { SpeechArbiter } from './arbiter';

/**
 * Scene Description
 *
 * On request, describes what is around the user in one or two sentences.
 * A vision model does the describing when one is configured; otherwise (or
 * when it fails) a summary is built from the current detections.
 */

export interface SceneImage {
  data: string;  // base64
  mimeType: string;
}

export interface SceneDescriber {
  describe(image: SceneImage, detections: Detection[]): Promise<string>;
}

export type SceneOrigin = 'describer' | 'fallback';

export interface SceneNarration {
  text: string;
  origin: SceneOrigin;
  request: SpeechRequest | null;
}

const SCENE_PROMPT = `You are describing a camera image for a visually impaired person walking indoors.
In one or two short sentences, say what is ahead, to the left and to the right.
Mention obstacles in the walking path first. Do not mention colors or lighting.
Respond with plain text only.`;

export function buildScenePrompt(detections: Detection[]): string {
  if (detections.length === 0) return SCENE_PROMPT;
  const seen = detections
    .map((d) => `${d.label} (${zoneOf(d.xCenter)})`)
    .join(', ');
  return `${SCENE_PROMPT}\nThe object detector currently reports: ${seen}.`;
}

export class GeminiSceneDescriber implements SceneDescriber {
  private model: GenerativeModel;

  constructor(apiKey: string, modelName: string) {
    const genAI = new GoogleGenerativeAI(apiKey);
    this.model = genAI.getGenerativeModel({ model: modelName });
  }

  async describe(image: SceneImage, detections: Detection[]): Promise<string> {
    const result = await this.model.generateContent([
      buildScenePrompt(detections),
      {
        inlineData: {
          mimeType: image.mimeType,
          data: image.data,
        },
      },
    ]);

    const text = result.response.text().trim();
    if (!text) {
      throw new Error('Scene describer returned an empty response');
    }
    return text;
  }
}

/**
 * Gemini describer when a key is configured, otherwise null (local summaries only).
 */
export function createSceneDescriber(apiKey: string, modelName: string): SceneDescriber | null {
  if (!apiKey) return null;
  return new GeminiSceneDescriber(apiKey, modelName);
}

function groupByZone(detections: Detection[]): Record<Zone, string[]> {
  const groups: Record<Zone, string[]> = { left: [], center: [], right: [] };
  for (const detection of detections) {
    groups[zoneOf(detection.xCenter)].push(detection.label);
  }
  return groups;
}

/**
 * e.g. "Ahead: chair. Left: person, door."
 */
export function buildFallbackDescription(detections: Detection[]): string {
  if (detections.length === 0) return 'No objects detected in view';

  const { left, center, right } = groupByZone(detections);
  const parts: string[] = [];
  if (center.length > 0) parts.push(`Ahead: ${center[0]}.`);
  if (left.length > 0) parts.push(`Left: ${left.join(', ')}.`);
  if (right.length > 0) parts.push(`Right: ${right.join(', ')}.`);
  return parts.join(' ');
}

export class SceneNarrator {
  private lastRequestAt: number | null = null;
  private generation = 0;

  constructor(
    private readonly describer: SceneDescriber | null,
    private readonly arbiter: SpeechArbiter,
    private readonly config: SceneConfig,
    private readonly clock: Clock,
    private readonly logger: Logger = silentLogger
  ) {}

  isCoolingDown(): boolean {
    if (this.lastRequestAt === null) return false;
    return this.clock() - this.lastRequestAt < this.config.cooldownMs;
  }

  /**
   * Describe and speak the scene. Resolves to null while the cooldown is running.
   * User-initiated, so the result goes out at navigation tier and interrupts.
   * A description still pending at `cancelPending()` or `reset()` is returned
   * unspoken, with `request: null`.
   */
  async narrate(image: SceneImage | null, detections: Detection[]): Promise<SceneNarration | null> {
    if (this.isCoolingDown()) {
      this.logger.debug('Scene description rate-limited');
      return null;
    }
    this.lastRequestAt = this.clock();
    const generation = this.generation;

    let text: string;
    let origin: SceneOrigin;
    if (this.describer && image) {
      try {
        text = await this.describer.describe(image, detections);
        origin = 'describer';
      } catch (error) {
        this.logger.error('Scene description failed, using detections:', error);
        text = buildFallbackDescription(detections);
        origin = 'fallback';
      }
    } else {
      text = buildFallbackDescription(detections);
      origin = 'fallback';
    }

    if (generation !== this.generation) {
      this.logger.debug('Scene description cancelled while pending');
      return { text, origin, request: null };
    }

    const request = this.arbiter.request(text, 'navigation', { source: 'scene', interrupt: true });
    return { text, origin, request };
  }

  cancelPending(): void {
    this.generation++;
  }

  reset(): void {
    this.cancelPending();
    this.lastRequestAt = null;
  }
}
