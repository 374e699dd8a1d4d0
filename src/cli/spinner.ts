/**
 * src/cli/spinner.ts
 *
 * "Thinking..." indicator shown while a model call is pending.
 * Writes carriage-return frames to the given stream; stop() wipes the line.
 */

export const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

const CLEAR_LINE = `\r${' '.repeat(20)}\r`;

export class Spinner {
  private timer: NodeJS.Timeout | null = null;
  private frame = 0;

  constructor(
    private readonly out: NodeJS.WritableStream,
    private readonly label = 'Thinking...',
    private readonly intervalMs = 100,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.frame = 0;
    this.out.write('\n');
    this.render();
    this.timer = setInterval(() => this.render(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.out.write(CLEAR_LINE);
  }

  /** Runs `task` with the spinner visible; always stops it. */
  async while<T>(task: () => Promise<T>): Promise<T> {
    this.start();
    try {
      return await task();
    } finally {
      this.stop();
    }
  }

  private render(): void {
    this.out.write(`\r${SPINNER_FRAMES[this.frame]} ${this.label}`);
    this.frame = (this.frame + 1) % SPINNER_FRAMES.length;
  }
}
