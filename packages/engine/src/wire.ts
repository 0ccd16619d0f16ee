import type { DetectedEvent, EventWireMessage } from './types.js';

/**
 * DetectedEvent → 送信用メッセージ
 * テンポとエネルギーは整数、時刻は秒
 */
export function toWireMessage(event: DetectedEvent): EventWireMessage {
  return {
    event_type: event.kind,
    intensity: event.intensity,
    bpm: Math.round(event.bpm),
    bass_energy: Math.round(event.bassEnergy),
    mid_energy: Math.round(event.midEnergy),
    high_energy: Math.round(event.highEnergy),
    timestamp: event.timestampMs / 1000,
  };
}
