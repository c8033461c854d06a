import type { IngestProgress } from '../types.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<IngestProgress['phase'], string> = {
  scanning: 'Scanning input',
  ingesting: 'Chunking',
  writing: 'Writing output',
};

export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength: number = 0;

  constructor(enabled: boolean = true) {
    this.enabled = enabled && process.stderr.isTTY;
  }

  update(progress: IngestProgress): void {
    if (!this.enabled) return;

    this.clearLine();
    const counter = fmt('cyan', `[${progress.current}/${progress.total}]`);
    const label = PHASE_LABELS[progress.phase];
    const file = progress.currentFile ? fmt('dim', ` - ${progress.currentFile}`) : '';
    const page =
      progress.page !== undefined && progress.lastPage !== undefined
        ? fmt('dim', ` page ${progress.page}/${progress.lastPage}`)
        : '';
    const line = `${counter} ${label}${file}${page}`;
    process.stderr.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    process.stderr.write(fmt('green', '✓') + ` ${message}\n`);
  }

  warn(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    process.stderr.write(fmt('yellow', '⚠') + ` ${message}\n`);
  }

  error(message: string): void {
    this.clearLine();
    process.stderr.write(fmt('red', '✗') + ` ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      process.stderr.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
