import { globalTimers, type Timers } from './timers';

export type RainContext = Pick<CanvasRenderingContext2D, 'fillStyle' | 'font' | 'fillRect' | 'fillText'>;

export const RAIN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789@#$%^&*()';

export interface MatrixRainOptions {
  fontSize?: number;
  alphabet?: string;
  interval?: number;
  random?: () => number;
  timers?: Timers;
}

/**
 * Falling-glyph background. One frame per tick: fade the previous frames,
 * draw a glyph at the head of every column, advance each drop.
 */
export class MatrixRain {
  private width = 0;
  private height = 0;
  private drops: number[] = [];
  private cancel: (() => void) | null = null;
  private frames = 0;

  private readonly fontSize: number;
  private readonly alphabet: string;
  private readonly interval: number;
  private readonly random: () => number;
  private readonly timers: Timers;

  constructor(
    private readonly ctx: RainContext,
    width: number,
    height: number,
    {
      fontSize = 14,
      alphabet = RAIN_ALPHABET,
      interval = 50,
      random = Math.random,
      timers = globalTimers,
    }: MatrixRainOptions = {},
  ) {
    this.fontSize = fontSize;
    this.alphabet = alphabet;
    this.interval = interval;
    this.random = random;
    this.timers = timers;
    this.resize(width, height);
  }

  get running(): boolean {
    return this.cancel !== null;
  }

  get frameCount(): number {
    return this.frames;
  }

  /** Drop rows per column. */
  get columns(): readonly number[] {
    return this.drops;
  }

  // Existing drops keep their rows; new columns start at the top.
  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    const count = Math.floor(width / this.fontSize);
    this.drops = Array.from({ length: count }, (_, i) => this.drops[i] ?? 1);
  }

  step(): void {
    const { ctx, fontSize } = this;
    ctx.fillStyle = 'rgba(10, 10, 10, 0.05)';
    ctx.fillRect(0, 0, this.width, this.height);

    ctx.fillStyle = '#27c93f';
    ctx.font = `${fontSize}px monospace`;

    for (let i = 0; i < this.drops.length; i++) {
      const glyph = this.alphabet.charAt(Math.floor(this.random() * this.alphabet.length));
      ctx.fillText(glyph, i * fontSize, this.drops[i] * fontSize);

      if (this.drops[i] * fontSize > this.height && this.random() > 0.975) {
        this.drops[i] = 0;
      }
      this.drops[i]++;
    }
    this.frames++;
  }

  start(): void {
    if (this.running) return;
    this.cancel = this.timers.setInterval(() => this.step(), this.interval);
  }

  stop(): void {
    this.cancel?.();
    this.cancel = null;
  }
}
