import { createInterface } from 'node:readline/promises';

/**
 * Ask a yes/no question on the terminal; only `y` or `yes` confirms.
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return isYes(answer);
  } finally {
    rl.close();
  }
}

export function isYes(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'yes';
}
