import type { TaskSnapshot } from '@multiflash/flasher';
import { formatBytes } from '@multiflash/flasher';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

function percent(done: number, total: number): number {
  if (total === 0) {
    return done === 0 ? 0 : 100;
  }
  return Math.floor((Math.min(done, total) / total) * 100);
}

export function imageLine(bytesRead: number, totalSize: number): string {
  return `Reading image: ${percent(bytesRead, totalSize)}% (${formatBytes(bytesRead)} of ${formatBytes(totalSize)})`;
}

export function taskLine(task: TaskSnapshot): string {
  return `W ${task.label}: ${Math.floor(task.fraction * 100)}% ${task.rate}`;
}

/**
 * Redraws a block of lines in place on a terminal. Elsewhere only the
 * final block is written.
 */
export class ProgressView {
  private drawn = 0;

  constructor(private out: OutputStream = process.stdout) {}

  draw(lines: readonly string[]): void {
    if (!this.out.isTTY) {
      return;
    }
    let frame = this.drawn > 0 ? `\x1b[${this.drawn}A` : '';
    for (const line of lines) {
      frame += `\r\x1b[K${line}\n`;
    }
    this.out.write(frame);
    this.drawn = lines.length;
  }

  finish(lines: readonly string[]): void {
    if (this.out.isTTY) {
      this.draw(lines);
    } else {
      this.out.write(lines.map((line) => `${line}\n`).join(''));
    }
    this.drawn = 0;
  }
}
