/**
 * Progress for the agent loop: an ora spinner on a TTY, one line per
 * change elsewhere (CI logs, pipes), nothing under --json.
 */

import ora from 'ora';

export interface Spinner {
  start(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  setText(text: string): void;
  /** Stop without a status line */
  stop(): void;
  readonly isSpinning: boolean;
}

/** process.stderr in production, so stdout carries only results */
export type SpinnerStream = NodeJS.WritableStream & { isTTY?: boolean };

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** Write nothing at all */
  quiet: boolean;
  stream: SpinnerStream;
}

/**
 * Writes `> text` when started or when the text changes, and one status
 * line when finished. With no stream it only tracks state.
 */
class LineSpinner implements Spinner {
  private spinning = false;
  private text: string;
  private readonly stream: SpinnerStream | null;

  constructor(text: string, stream: SpinnerStream | null) {
    this.text = text;
    this.stream = stream;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }

  start(): void {
    this.spinning = true;
    this.write(`> ${this.text}`);
  }

  setText(text: string): void {
    const changed = text !== this.text;
    this.text = text;
    if (changed && this.spinning) {
      this.write(`> ${text}`);
    }
  }

  succeed(text?: string): void {
    this.finish('✅', text);
  }

  fail(text?: string): void {
    this.finish('❌', text);
  }

  warn(text?: string): void {
    this.finish('⚠️ ', text);
  }

  stop(): void {
    this.spinning = false;
  }

  private finish(symbol: string, text = this.text): void {
    this.spinning = false;
    this.write(`${symbol} ${text}`);
  }

  private write(line: string): void {
    this.stream?.write(`${line}\n`);
  }
}

function oraSpinner(text: string, stream: SpinnerStream): Spinner {
  const spinner = ora({ text, stream, color: 'cyan' });
  return {
    start() {
      spinner.start();
    },
    succeed(done) {
      spinner.succeed(done);
    },
    fail(done) {
      spinner.fail(done);
    },
    warn(done) {
      spinner.warn(done);
    },
    setText(next) {
      spinner.text = next;
    },
    stop() {
      spinner.stop();
    },
    get isSpinning() {
      return spinner.isSpinning;
    },
  };
}

export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private active: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stderr;
    this.config = {
      isTTY: config.isTTY ?? stream.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream,
    };
  }

  /** Starts a new spinner; the previous one, if still running, is stopped */
  start(text: string): Spinner {
    this.stopAll();
    const { quiet, isTTY, stream } = this.config;
    const spinner = quiet ? new LineSpinner(text, null) : isTTY ? oraSpinner(text, stream) : new LineSpinner(text, stream);
    this.active = spinner;
    spinner.start();
    return spinner;
  }

  stopAll(): void {
    if (this.active?.isSpinning) {
      this.active.stop();
    }
    this.active = null;
  }

  getActive(): Spinner | null {
    return this.active;
  }

  isQuiet(): boolean {
    return this.config.quiet;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
