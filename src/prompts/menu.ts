/**
 * Numbered menus and validated free-text input.
 *
 * Invalid input re-prompts in place, up to a retry budget; running out of
 * attempts raises a FatalError with the prompt that could not be answered.
 */

import { FatalError } from '../utils/errors.js';
import type { Prompter } from './prompter.js';

export const DEFAULT_RETRY_LIMIT = 5;

const INTEGER_PATTERN = /^\d+$/;
const BACK_INPUTS = new Set(['b', 'back']);

/**
 * Parse a 1-based menu choice. Returns the zero-based index, or null when the
 * input is not an integer in 1..count.
 */
export function parseSelection(input: string, count: number): number | null {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const choice = parseInt(trimmed, 10);
  if (choice < 1 || choice > count) return null;
  return choice - 1;
}

export type MenuResult<T> =
  | { action: 'selected'; value: T; index: number }
  | { action: 'back' };

export interface MenuOptions<T> {
  title: string;
  items: readonly T[];
  label: (item: T) => string;
  allowBack?: boolean;
  retryLimit?: number;
}

function budgetExhausted(what: string, attempts: number): FatalError {
  return new FatalError(
    'retry-budget-exhausted',
    `No valid answer for "${what}" after ${attempts} attempts - aborting`
  );
}

export async function chooseFromList<T>(prompter: Prompter, options: MenuOptions<T>): Promise<MenuResult<T>> {
  const { title, items, label, allowBack = false } = options;
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;

  if (items.length === 0) {
    throw new Error(`chooseFromList called with no items for "${title}"`);
  }

  prompter.say(`\n${title}`);
  items.forEach((item, i) => {
    prompter.say(`  ${i + 1}. ${label(item)}`);
  });

  const hint = allowBack
    ? `Enter a number (1-${items.length}) or 'b' to go back`
    : `Enter a number (1-${items.length})`;

  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const answer = await prompter.ask(hint);

    if (allowBack && BACK_INPUTS.has(answer.trim().toLowerCase())) {
      return { action: 'back' };
    }

    const index = parseSelection(answer, items.length);
    if (index !== null) {
      return { action: 'selected', value: items[index], index };
    }

    prompter.say(`  ✗ "${answer}" is not a valid choice`);
  }

  throw budgetExhausted(title, retryLimit);
}

/**
 * Yes/no question. Blank input takes the default when one is given.
 */
export async function confirm(
  prompter: Prompter,
  message: string,
  options: { default?: boolean; retryLimit?: number } = {}
): Promise<boolean> {
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
  const suffix = options.default === undefined ? '(y/n)' : options.default ? '(Y/n)' : '(y/N)';

  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const answer = (await prompter.ask(`${message} ${suffix}`)).trim().toLowerCase();
    if (answer === '' && options.default !== undefined) return options.default;
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    prompter.say('  ✗ Please answer y or n');
  }

  throw budgetExhausted(message, retryLimit);
}

export type Validator = (value: string) => string | null;

/**
 * Free-text input checked by `validate` (returns an error message or null).
 * Blank input takes the default when one is given.
 */
export async function askValidated(
  prompter: Prompter,
  message: string,
  validate: Validator,
  options: { default?: string; retryLimit?: number } = {}
): Promise<string> {
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
  const prompt = options.default ? `${message} [${options.default}]` : message;

  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const raw = (await prompter.ask(prompt)).trim();
    const value = raw === '' && options.default !== undefined ? options.default : raw;

    const problem = value === '' ? 'A value is required' : validate(value);
    if (problem === null) return value;

    prompter.say(`  ✗ ${problem}`);
  }

  throw budgetExhausted(message, retryLimit);
}

/**
 * Masked input entered twice and compared for equality
 */
export async function askSecretTwice(
  prompter: Prompter,
  label: string,
  validate: Validator = () => null,
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<string> {
  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const first = await prompter.askSecret(label);
    const problem = first === '' ? 'A value is required' : validate(first);
    if (problem !== null) {
      prompter.say(`  ✗ ${problem}`);
      continue;
    }

    const second = await prompter.askSecret(`Confirm ${label.toLowerCase()}`);
    if (first === second) return first;

    prompter.say('  ✗ Entries do not match');
  }

  throw budgetExhausted(label, retryLimit);
}
