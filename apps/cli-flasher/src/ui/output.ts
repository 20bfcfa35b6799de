import type { FlashLogger } from '@multiflash/flasher';

const useColor = !process.env.NO_COLOR && process.stdout.isTTY;

function color(code: number, text: string): string {
  return useColor ? `\x1b[${code}m${text}\x1b[0m` : text;
}

export const green = (t: string) => color(32, t);
export const yellow = (t: string) => color(33, t);
export const red = (t: string) => color(31, t);
export const dim = (t: string) => color(2, t);
export const bold = (t: string) => color(1, t);

export function printHelp(): void {
  console.log(`${bold('Usage:')} multiflash <IMAGE> [DISKS...] [options]

Write one disk image to several drives at once.

${bold('Arguments:')}
  IMAGE           Input image file
  DISKS           Output disk devices

${bold('Options:')}
  -a, --all       Flash all detected USB drives
  -c, --check     Check written image matches read image
  -u, --unmount   Unmount mounted devices
  -y, --yes       Continue without confirmation
      --verbose   Log progress details to stderr
  -h, --help      Show this help message
`);
}

export function printSuccess(msg: string): void {
  console.log(`${green('✓')} ${msg}`);
}

export function printWarning(msg: string): void {
  console.log(`${yellow('!')} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${red('multiflash:')} ${msg}`);
}

/** Library log lines, shown only with --verbose. */
export const stderrLogger: FlashLogger = (message, level) => {
  const line = `[${level.toUpperCase()}] ${message}`;
  console.error(level === 'error' ? red(line) : level === 'warning' ? yellow(line) : dim(line));
};
