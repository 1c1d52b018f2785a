import { createInterface } from 'readline/promises';
import type { Interface } from 'readline/promises';

export type Prompt = Interface;

const closed = new WeakSet<Prompt>();

export function createPrompt(): Prompt {
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  prompt.once('close', () => closed.add(prompt));
  return prompt;
}

/** The answer, or null once input is closed (Ctrl-D). */
export async function ask(prompt: Prompt, question: string): Promise<string | null> {
  if (closed.has(prompt)) return null;

  let onClose: () => void = () => undefined;
  const ended = new Promise<null>(resolve => {
    onClose = () => resolve(null);
    prompt.once('close', onClose);
  });
  try {
    return await Promise.race([prompt.question(question), ended]);
  } catch (error) {
    if (closed.has(prompt)) return null;
    throw error;
  } finally {
    prompt.off('close', onClose);
  }
}

/** Read a `[Y/n]`-style answer. Empty input takes the default. */
export function parseYesNo(answer: string, fallback: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '') return fallback;
  return normalized === 'y' || normalized === 'yes';
}

/** Closed input counts as no. */
export async function askYesNo(prompt: Prompt, question: string, fallback: boolean): Promise<boolean> {
  const answer = await ask(prompt, `${question} ${fallback ? '[Y/n]' : '[y/N]'} `);
  return answer !== null && parseYesNo(answer, fallback);
}
