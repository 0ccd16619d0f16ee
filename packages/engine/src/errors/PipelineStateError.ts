import type { PipelineState } from '../types.js';

/**
 * 不正な状態遷移（running 中の start、running 以外での stop）
 */
export class PipelineStateError extends Error {
  constructor(
    public readonly action: 'start' | 'stop',
    public readonly state: PipelineState,
  ) {
    super(`cannot ${action} a pipeline that is ${state}`);
    this.name = 'PipelineStateError';
  }
}
