/**
 * Console walk-through of a guidance session
 *
 * Run with: npm run simulate
 * GUIDANCE_STRATEGY=legacy and GUIDANCE_DEBUG=1 change what you see.
 */

import {
  GuidanceSession,
  ManualClock,
  SpeechQueue,
  createConsoleUtterer,
  createLogger,
  createSceneDescriber,
  describeDepthCoverage,
  loadGuidanceConfigFromEnv,
} from '../lib/navigation';
import type { Frame } from '../types/navigation';

interface ScriptedFrame {
  at: number;  // ms since start
  note: string;
  frame: Frame;
}

const walk: ScriptedFrame[] = [
  { at: 0, note: 'Empty corridor', frame: { detections: [] } },
  {
    at: 3000,
    note: 'Chair appears ahead, slightly right',
    frame: {
      detections: [
        { label: 'chair', confidence: 0.85, xCenter: 0.55, yCenter: 0.7, width: 0.25, height: 0.3, distanceMeters: 2.0 },
      ],
    },
  },
  {
    at: 3500,
    note: 'Same chair, flicker frame',
    frame: {
      detections: [
        { label: 'chair', confidence: 0.8, xCenter: 0.56, yCenter: 0.7, width: 0.26, height: 0.3, distanceMeters: 1.9 },
      ],
    },
  },
  {
    at: 6000,
    note: 'Wide table right in front',
    frame: {
      detections: [
        { label: 'table', confidence: 0.9, xCenter: 0.5, yCenter: 0.75, width: 0.7, height: 0.4, distanceMeters: 0.8 },
      ],
    },
  },
  {
    at: 7300,
    note: 'Still blocked',
    frame: {
      detections: [
        { label: 'table', confidence: 0.9, xCenter: 0.5, yCenter: 0.75, width: 0.72, height: 0.4, distanceMeters: 0.7 },
      ],
    },
  },
  {
    at: 10000,
    note: 'Stepped around it, person on the left',
    frame: {
      detections: [
        { label: 'person', confidence: 0.75, xCenter: 0.15, yCenter: 0.6, width: 0.15, height: 0.6, distanceMeters: 3.0 },
      ],
    },
  },
  {
    at: 13000,
    note: 'Depth map only, door ahead',
    frame: {
      detections: [{ label: 'door', confidence: 0.7, xCenter: 0.5, yCenter: 0.6, width: 0.3, height: 0.8 }],
      depthMap: { width: 4, height: 4, data: new Array<number>(16).fill(300) },
    },
  },
  { at: 16000, note: 'Clear again', frame: { detections: [] } },
  { at: 20000, note: 'Still clear', frame: { detections: [] } },
  { at: 24000, note: 'Still clear', frame: { detections: [] } },
];

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

async function main(): Promise<void> {
  const logger = createLogger('Simulation');
  const settings = loadGuidanceConfigFromEnv();
  const clock = new ManualClock(0);
  const queue = new SpeechQueue(createConsoleUtterer());

  const session = new GuidanceSession({
    sink: queue,
    config: settings.config,
    strategy: settings.strategy,
    clock: clock.now,
    logger: createLogger('Guidance', { debug: settings.debug }),
    sceneDescriber: createSceneDescriber(settings.geminiApiKey, settings.config.scene.model),
  });

  console.log('='.repeat(60));
  console.log(`Guidance simulation (${session.getStrategy()} strategy)`);
  console.log('='.repeat(60));

  for (const step of walk) {
    clock.set(step.at);
    console.log(`\n[t=${(step.at / 1000).toFixed(1)}s] ${step.note}`);

    const outcome = session.processFrame(step.frame);
    if (step.frame.depthMap) logger.info(describeDepthCoverage(outcome.detections));
    if (!outcome.announcement && !outcome.narration) console.log('  (silent)');

    await flush();
  }

  console.log('\n' + '-'.repeat(60));
  console.log('Scene description (no camera image here, so a local summary)');
  const scene = await session.describeScene(null, [
    { label: 'person', confidence: 0.8, xCenter: 0.2, yCenter: 0.6, width: 0.1, height: 0.5 },
    { label: 'door', confidence: 0.8, xCenter: 0.5, yCenter: 0.5, width: 0.2, height: 0.7 },
  ]);
  await flush();
  console.log(`  origin: ${scene?.origin ?? 'rate-limited'}`);

  console.log('\n' + '='.repeat(60));
  console.log('Simulation completed!');
  console.log('='.repeat(60));
}

main().catch((error: unknown) => {
  console.error('Simulation failed:', error);
  process.exitCode = 1;
});
