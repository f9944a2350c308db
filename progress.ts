import pc from 'picocolors';

/**
 * Where the analyzer and the GitHub source report what they are doing.
 * Passed in explicitly; nothing writes to the console on its own.
 */
export interface ProgressReporter {
  phase(description: string): void;
  start(total: number, label: string): void;
  advance(count?: number): void;
  finish(): void;
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

const BAR_WIDTH = 30;

/**
 * Strip ANSI codes from a string to get visible length
 */
function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Render a progress bar, e.g. "[███████░░░] 70% 7/10"
 */
export function renderProgressBar(processed: number, total: number, width: number = BAR_WIDTH): string {
  const ratio = total > 0 ? Math.min(processed / total, 1) : 0;
  const filled = Math.round(ratio * width);
  const percent = Math.round(ratio * 100).toString().padStart(3);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${percent}% ${processed}/${total}`;
}

/** The part of a TTY stream the reporter writes through */
export interface ReporterStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface ConsoleReporterOptions {
  verbose?: boolean;
  stream?: ReporterStream;
}

/**
 * Emoji-prefixed status lines and a progress bar on stderr, so stdout
 * stays clean for JSON and CSV output.
 */
export class ConsoleReporter implements ProgressReporter {
  private stream: ReporterStream;
  private verbose: boolean;
  private total = 0;
  private processed = 0;
  private label = '';
  private lastLineLength = 0;
  private active = false;

  constructor(options: ConsoleReporterOptions = {}) {
    this.stream = options.stream ?? process.stderr;
    this.verbose = options.verbose ?? false;
  }

  phase(description: string): void {
    this.writeLine(pc.dim(description));
  }

  start(total: number, label: string): void {
    this.total = total;
    this.processed = 0;
    this.label = label;
    this.active = true;
    this.render();
  }

  advance(count = 1): void {
    if (!this.active) return;
    this.processed += count;
    // The total is an estimate; grow it rather than overflow
    if (this.processed > this.total) this.total = this.processed;
    this.render();
  }

  finish(): void {
    if (!this.active) return;
    this.total = this.processed;
    this.render();
    this.active = false;
    if (this.stream.isTTY) {
      this.stream.write('\n');
      this.lastLineLength = 0;
    }
  }

  info(message: string): void {
    this.writeLine(message);
  }

  warn(message: string): void {
    this.writeLine(pc.yellow(`⚠️  ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) this.writeLine(pc.gray(`[debug] ${message}`));
  }

  private render(): void {
    // Redrawing only makes sense on a terminal
    if (!this.stream.isTTY) return;
    const line = `${pc.cyan(this.label)} ${renderProgressBar(this.processed, this.total)}`;
    this.clearLine();
    this.stream.write(line);
    this.lastLineLength = stripAnsi(line).length;
  }

  private clearLine(): void {
    if (this.lastLineLength === 0) return;
    this.stream.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
    this.lastLineLength = 0;
  }

  private writeLine(message: string): void {
    this.clearLine();
    this.stream.write(message + '\n');
    if (this.active) this.render();
  }
}

/**
 * Drops everything except warnings, which it keeps for inspection
 */
export class SilentReporter implements ProgressReporter {
  readonly warnings: string[] = [];

  phase(): void {}
  start(): void {}
  advance(): void {}
  finish(): void {}
  info(_message: string): void {}
  debug(): void {}

  warn(message: string): void {
    this.warnings.push(message);
  }
}
