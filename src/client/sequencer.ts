import type { BootLine } from '../utils/bootLine';
import { globalTimers, type Timers } from './timers';

export type Phase = 'idle' | 'boot' | 'reveal' | 'done';

export type SegmentMode = 'line' | 'type';

export interface Segment {
  mode: SegmentMode;
  /** Characters in the segment; only `type` segments use it for pacing. */
  length: number;
}

export interface SequenceTiming {
  bootStartDelay: number;
  bootLineInterval: number;
  /** Pause after the last boot line before the overlay is lifted. */
  bootHold: number;
  lineInterval: number;
  charInterval: number;
}

export const DEFAULT_TIMING: SequenceTiming = {
  bootStartDelay: 500,
  bootLineInterval: 80,
  bootHold: 800,
  lineInterval: 60,
  charInterval: 18,
};

export interface SequenceView {
  showBootLine(line: BootLine, index: number): void;
  finishBoot(): void;
  revealSegment(index: number, visibleChars: number): void;
  finishReveal(): void;
}

export interface SequencerOptions {
  bootLog: readonly BootLine[];
  segments: readonly Segment[];
  view: SequenceView;
  timing?: Partial<SequenceTiming>;
  timers?: Timers;
  onDone?: () => void;
}

export interface Sequencer {
  readonly phase: Phase;
  start(): void;
}

export class SequencerStateError extends Error {
  constructor(phase: Phase) {
    super(`sequencer already started (phase: ${phase})`);
    this.name = 'SequencerStateError';
  }
}

const segmentSteps = (segment: Segment) => (segment.mode === 'type' ? Math.max(1, segment.length) : 1);

/** Simulated ms from `start()` until the last segment has been revealed. */
export const sequenceDuration = (
  bootCount: number,
  segments: readonly Segment[],
  timing: SequenceTiming = DEFAULT_TIMING,
): number => {
  const boot = timing.bootStartDelay + bootCount * timing.bootLineInterval + timing.bootHold;
  const reveal = segments.reduce(
    (total, segment) =>
      total +
      (segment.mode === 'type' ? segmentSteps(segment) * timing.charInterval : timing.lineInterval),
    0,
  );
  return boot + reveal;
};

/**
 * Boot log first, then the story segments, each step scheduling the next.
 * The ambient rain runs separately (see MatrixRain).
 */
export const createSequencer = ({
  bootLog,
  segments,
  view,
  timing: timingOverrides,
  timers = globalTimers,
  onDone,
}: SequencerOptions): Sequencer => {
  const timing: SequenceTiming = { ...DEFAULT_TIMING, ...timingOverrides };
  let phase: Phase = 'idle';

  const finish = () => {
    phase = 'done';
    view.finishReveal();
    onDone?.();
  };

  const reveal = (index: number, shown: number): void => {
    if (index >= segments.length) {
      finish();
      return;
    }

    const segment = segments[index];
    if (segment.mode === 'line') {
      view.revealSegment(index, segment.length);
      timers.setTimeout(() => reveal(index + 1, 0), timing.lineInterval);
      return;
    }

    const visible = Math.min(shown + 1, segment.length);
    view.revealSegment(index, visible);
    const complete = shown + 1 >= segmentSteps(segment);
    timers.setTimeout(
      () => (complete ? reveal(index + 1, 0) : reveal(index, visible)),
      timing.charInterval,
    );
  };

  const boot = (index: number): void => {
    if (index < bootLog.length) {
      view.showBootLine(bootLog[index], index);
      timers.setTimeout(() => boot(index + 1), timing.bootLineInterval);
      return;
    }
    timers.setTimeout(() => {
      view.finishBoot();
      phase = 'reveal';
      reveal(0, 0);
    }, timing.bootHold);
  };

  return {
    get phase() {
      return phase;
    },
    start() {
      if (phase !== 'idle') throw new SequencerStateError(phase);
      phase = 'boot';
      timers.setTimeout(() => boot(0), timing.bootStartDelay);
    },
  };
};
