import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string): Ora {
  return ora({ text, spinner: 'dots', isEnabled: process.stdout.isTTY === true });
}

export async function withSpinner<T>(text: string, fn: () => Promise<T>): Promise<T> {
  const spinner = createSpinner(text);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
