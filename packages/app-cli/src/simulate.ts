/**
 * packages/app-cli/src/simulate.ts
 * Feeds synthetic beat patterns through the detection pipeline (no audio device needed).
 *
 * Usage:
 *   npm run simulate
 *   BEATFLASH_PRESET=normalized npm run simulate
 *
 * Settings come from engine-settings.yaml, the preset and BEATFLASH_* variables only.
 */
import { pathToFileURL } from 'url';
import { ConfigLoader, ConfigUtils } from '@beatflash/config';
import type { EngineConfig, EventKind } from '@beatflash/config';
import type { TempoEstimator } from '@beatflash/audio-analysis';
import { StreamingPipeline, toWireMessage } from '@beatflash/engine';
import type { DetectedEvent, EventWireMessage } from '@beatflash/engine';
import { QueuedEventSink, createLoggingTransport, flushLogs, installShutdownHandlers, logger } from '@beatflash/obs';
import type { EventSink } from '@beatflash/obs';

export type SimulationPattern = {
  name: string;
  beats: number[]; // accent per beat, 0..1
};

export const DEFAULT_PATTERNS: readonly SimulationPattern[] = [
  { name: 'steady', beats: [1.0, 0.5, 0.7, 0.5] },
  { name: 'build-up', beats: [0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0] },
  { name: 'drop', beats: [1.0, 1.0, 0.8, 0.8, 1.0, 0.6, 0.9, 0.7] },
  { name: 'breakdown', beats: [0.8, 0.3, 0.8, 0.3, 0.8, 0.3] },
];

export type SignalOptions = {
  sampleRate: number;
  chunkSize: number;
  bpm?: number; // default 120
  seed?: number; // default 1
  noiseAmplitude?: number; // default 400
  pulseAmplitude?: number; // peak at accent 1.0, default 20000
  pulseFrequency?: number; // Hz, default 60
  pulseMs?: number; // default 120
};

/**
 * mulberry32
 * 同じ seed なら同じ系列 [0, 1)
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * パターンをチャンク列に変換
 * 拍ごとに減衰する低音の正弦波パルス + 一様ノイズ。最後のチャンクはノイズで埋める
 */
export function generateSimulatedChunks(pattern: SimulationPattern, options: SignalOptions): Int16Array[] {
  const {
    sampleRate,
    chunkSize,
    bpm = 120,
    seed = 1,
    noiseAmplitude = 400,
    pulseAmplitude = 20000,
    pulseFrequency = 60,
    pulseMs = 120,
  } = options;
  if (!(bpm > 0) || !(sampleRate > 0) || !Number.isInteger(chunkSize) || chunkSize < 2) {
    throw new RangeError(`invalid simulation options: bpm=${bpm} sampleRate=${sampleRate} chunkSize=${chunkSize}`);
  }

  const random = createRandom(seed);
  const beatSamples = Math.round((60 / bpm) * sampleRate);
  const pulseSamples = Math.round((pulseMs / 1000) * sampleRate);
  const decay = pulseSamples / 3;
  const chunkCount = Math.ceil((pattern.beats.length * beatSamples) / chunkSize);
  const signal = new Int16Array(chunkCount * chunkSize);

  for (let i = 0; i < signal.length; i++) {
    let value = (random() * 2 - 1) * noiseAmplitude;
    const beat = Math.floor(i / beatSamples);
    const offset = i - beat * beatSamples;
    if (beat < pattern.beats.length && offset < pulseSamples) {
      const envelope = pattern.beats[beat] * pulseAmplitude * Math.exp(-offset / decay);
      value += envelope * Math.sin((2 * Math.PI * pulseFrequency * offset) / sampleRate);
    }
    signal[i] = Math.max(-32768, Math.min(32767, Math.round(value)));
  }

  const chunks: Int16Array[] = [];
  for (let c = 0; c < chunkCount; c++) {
    chunks.push(signal.slice(c * chunkSize, (c + 1) * chunkSize));
  }
  return chunks;
}

export type SimulationOptions = {
  config: EngineConfig;
  patterns?: readonly SimulationPattern[];
  bpm?: number;
  seed?: number;
  sink?: EventSink<DetectedEvent>;
  tempoEstimator?: TempoEstimator;
};

export type SimulationReport = {
  chunks: number;
  events: DetectedEvent[];
  eventsByKind: Record<EventKind, number>;
  finalBpm: number;
};

/**
 * 全パターンを1本のパイプラインに流す
 * 時計はチャンク長ずつ進める（実時間は待たない）
 */
export async function runSimulation(options: SimulationOptions): Promise<SimulationReport> {
  const { config, patterns = DEFAULT_PATTERNS, bpm, seed = 1 } = options;
  const { sampleRate, chunkSize } = config.audio;
  const chunkMs = ConfigUtils.chunkDurationMs(chunkSize, sampleRate);

  let clockMs = 0;
  const pipeline = new StreamingPipeline(config, {
    sink: options.sink,
    tempoEstimator: options.tempoEstimator,
    now: () => clockMs,
  });

  const events: DetectedEvent[] = [];
  const counts: Record<EventKind, number> = { bass_drop: 0, rhythm: 0, vocal: 0, build: 0 };

  pipeline.start();
  for (const [index, pattern] of patterns.entries()) {
    logger.info('simulate.pattern', { pattern: pattern.name, beats: pattern.beats.length, bpm: bpm ?? 120 });
    const chunks = generateSimulatedChunks(pattern, { sampleRate, chunkSize, bpm, seed: seed + index });
    for (const chunk of chunks) {
      const event = pipeline.processChunk(chunk, sampleRate);
      if (event) {
        events.push(event);
        counts[event.kind]++;
      }
      clockMs += chunkMs;
      // テンポ推定を進める
      // eslint-disable-next-line no-await-in-loop
      await new Promise<void>(resolve => setImmediate(resolve));
    }
  }

  const report: SimulationReport = {
    chunks: pipeline.chunkCount,
    events,
    eventsByKind: counts,
    finalBpm: pipeline.currentBpm,
  };
  pipeline.stop();
  return report;
}

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<SimulationReport> {
  const loader = ConfigLoader.getInstance();
  const config = await loader.load({ env });

  const sink = new QueuedEventSink<DetectedEvent, EventWireMessage>(
    createLoggingTransport<EventWireMessage>('flash.event'),
    { serialize: toWireMessage, name: 'simulate' }
  );
  const report = await runSimulation({ config, sink });
  await sink.flush();

  logger.info('simulate.completed', {
    chunks: report.chunks,
    events: report.events.length,
    byKind: report.eventsByKind,
    bpm: report.finalBpm,
    sink: sink.stats,
  });
  await flushLogs();
  return report;
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  installShutdownHandlers();
  main().catch((err: unknown) => {
    logger.error('simulate.failed', { error: err });
    process.exitCode = 1;
  });
}
