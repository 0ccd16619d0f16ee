import { performance } from 'perf_hooks';
import { EngineValidator } from '@beatflash/config';
import type { EngineConfig, EventKind, GateSignal } from '@beatflash/config';
import {
  AutocorrelationTempoEstimator,
  CooldownClock,
  EventClassifier,
  FrequencyBandAnalyzer,
  GateBank,
  IntensityMapper,
  RollingHistory,
  TempoScheduler,
  calculateRms,
} from '@beatflash/audio-analysis';
import type { BandEnergy, PcmSamples } from '@beatflash/audio-analysis';
import { QueuedEventSink, createLoggingTransport, logger } from '@beatflash/obs';
import type { EventSink } from '@beatflash/obs';
import { PipelineStateError } from './errors/PipelineStateError.js';
import { toWireMessage } from './wire.js';
import type { BandAnalyzer, DetectedEvent, PipelineDependencies, PipelineState } from './types.js';

/**
 * ストリーミング検出パイプライン
 *
 * チャンクごとの処理は processChunk 内で同期的に完結する。
 * テンポ推定は非同期に投げ、送信はシンクのキューに任せる。
 * 状態: idle → running → stopped（stopped から再度 start 可能）
 */
export class StreamingPipeline {
  public readonly config: EngineConfig;

  private readonly analyzer: BandAnalyzer;
  private readonly sink: EventSink<DetectedEvent>;
  private readonly now: () => number;

  private readonly volumeHistory: RollingHistory;
  private readonly bassHistory: RollingHistory;
  private readonly midHistory: RollingHistory;
  private readonly cooldown: CooldownClock;
  private readonly gates: GateBank;
  private readonly classifier: EventClassifier;
  private readonly intensityMapper: IntensityMapper;
  private readonly tempo: TempoScheduler;

  private currentState: PipelineState = 'idle';
  private chunks = 0;
  private events = 0;

  constructor(config: EngineConfig, deps: PipelineDependencies = {}) {
    // 不正な設定はここで ConfigurationError
    const validator = new EngineValidator();
    this.config = validator.validate(config);
    for (const warning of validator.collectWarnings(this.config)) {
      logger.warn('pipeline.config_warning', { warning });
    }

    const { audio, history, gating, classifier, intensity, tempo } = this.config;
    this.analyzer = deps.analyzer ?? new FrequencyBandAnalyzer({ normalize: audio.normalizeSamples });
    this.sink = deps.sink ?? new QueuedEventSink(createLoggingTransport(), { serialize: toWireMessage });
    // 単調時計（epoch 基準の ms）
    this.now = deps.now ?? (() => performance.timeOrigin + performance.now());

    this.volumeHistory = new RollingHistory(history.capacity);
    this.bassHistory = new RollingHistory(history.capacity);
    this.midHistory = new RollingHistory(history.capacity);
    this.cooldown = new CooldownClock(gating.cooldownMs);
    this.gates = new GateBank(gating, history.warmupSamples);
    this.classifier = new EventClassifier(classifier, history.warmupSamples);
    this.intensityMapper = new IntensityMapper(intensity);
    this.tempo = new TempoScheduler(
      tempo,
      deps.tempoEstimator ?? new AutocorrelationTempoEstimator({ minBpm: tempo.minBpm, maxBpm: tempo.maxBpm })
    );
  }

  public get state(): PipelineState {
    return this.currentState;
  }

  public get currentBpm(): number {
    return this.tempo.currentBpm;
  }

  public get chunkCount(): number {
    return this.chunks;
  }

  public get eventCount(): number {
    return this.events;
  }

  public start(): void {
    if (this.currentState === 'running') {
      throw new PipelineStateError('start', this.currentState);
    }
    this.resetState();
    this.currentState = 'running';
    logger.info('pipeline.started', {
      sampleRate: this.config.audio.sampleRate,
      chunkSize: this.config.audio.chunkSize,
      gates: this.gates.signals,
      intensityPolicy: this.config.intensity.policy,
      tempo: this.config.tempo.enabled,
    });
  }

  public stop(): void {
    if (this.currentState !== 'running') {
      throw new PipelineStateError('stop', this.currentState);
    }
    this.currentState = 'stopped';
    // 推定中のテンポ結果は破棄される
    this.tempo.reset();
    this.volumeHistory.clear();
    this.bassHistory.clear();
    this.midHistory.clear();
    logger.info('pipeline.stopped', { chunks: this.chunks, events: this.events });
  }

  /**
   * 1チャンクを処理し、イベントが確定すれば返す
   * 異常な入力・無音・ゲート不成立・分類不成立はすべて null
   */
  public processChunk(samples: PcmSamples, sampleRate: number): DetectedEvent | null {
    if (this.currentState !== 'running') return null;
    if (samples.length < 2 || !(sampleRate > 0)) return null;

    const bands = this.analyzer.analyze(samples, sampleRate);
    const volume = calculateRms(samples);
    this.chunks++;

    this.volumeHistory.push(volume);
    this.bassHistory.push(bands.bass);
    this.midHistory.push(bands.mid);

    // 結果は後のタスクで currentBpm に反映される（reject しない）
    void this.tempo.maybeUpdateTempo(this.chunks, samples, sampleRate);

    if (volume <= this.config.gating.silenceFloor) return null;

    const nowMs = this.now();
    const decision = this.gates.evaluate({
      volume: { value: volume, history: this.volumeHistory },
      bass: { value: bands.bass, history: this.bassHistory },
      mid: { value: bands.mid, history: this.midHistory },
    }, this.cooldown, nowMs);
    if (!decision.open) return null;

    const kind = this.classifier.classify(bands.bass, bands.mid, this.bassHistory, this.midHistory);
    if (kind === null) {
      logger.debug('pipeline.vetoed', { chunk: this.chunks, fired: decision.fired, bass: bands.bass, mid: bands.mid });
      return null;
    }

    const event = this.buildEvent(kind, bands, volume, decision.fired, nowMs);
    this.cooldown.markFired(nowMs);
    this.events++;
    this.deliver(event);
    return event;
  }

  private buildEvent(
    kind: EventKind,
    bands: BandEnergy,
    volume: number,
    fired: GateSignal[],
    nowMs: number
  ): DetectedEvent {
    return Object.freeze({
      kind,
      intensity: this.intensityMapper.intensity(volume, kind),
      bpm: this.tempo.currentBpm,
      bassEnergy: bands.bass,
      midEnergy: bands.mid,
      highEnergy: bands.high,
      vocalEnergy: bands.vocal,
      volume,
      triggeredBy: Object.freeze([...fired]),
      timestampMs: nowMs,
    });
  }

  private deliver(event: DetectedEvent): void {
    try {
      this.sink.emit(event);
    } catch (err) {
      logger.error('pipeline.emit_failed', { kind: event.kind, error: err });
    }
  }

  private resetState(): void {
    this.volumeHistory.clear();
    this.bassHistory.clear();
    this.midHistory.clear();
    this.cooldown.reset();
    this.tempo.reset();
    this.chunks = 0;
    this.events = 0;
  }
}
