import { createInterface } from 'readline/promises';

/**
 * Interactive yes/no question
 */
export interface Prompt {
  confirm(question: string): Promise<boolean>;
}

/**
 * Prompt reading from stdin. Anything other than y/yes declines, and so does a
 * non-interactive stdin (use `--yes` there).
 */
export class TerminalPrompt implements Prompt {
  public async confirm(question: string): Promise<boolean> {
    if (!process.stdin.isTTY) {
      return false;
    }
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      const answer = await rl.question(`${question} [y/N] `);
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}
