import { describe, it, expect } from 'vitest';

import { ScriptedPrompter } from '../testing/scripted-prompter.js';
import { FatalError } from '../utils/errors.js';
import { askSecretTwice, askValidated, chooseFromList, confirm, parseSelection } from './menu.js';

describe('parseSelection', () => {
  it('maps 1-based input to a 0-based index', () => {
    expect(parseSelection('1', 3)).toBe(0);
    expect(parseSelection(' 3 ', 3)).toBe(2);
  });

  it('rejects out-of-range and non-integer input', () => {
    expect(parseSelection('0', 3)).toBeNull();
    expect(parseSelection('4', 3)).toBeNull();
    expect(parseSelection('1.5', 3)).toBeNull();
    expect(parseSelection('abc', 3)).toBeNull();
    expect(parseSelection('-1', 3)).toBeNull();
  });
});

describe('chooseFromList', () => {
  const items = ['alpha', 'beta', 'gamma'];

  it('re-prompts on invalid input and returns the chosen item', async () => {
    const prompter = new ScriptedPrompter(['7', 'x', '2']);

    const result = await chooseFromList(prompter, { title: 'Pick one:', items, label: s => s });

    expect(result).toEqual({ action: 'selected', value: 'beta', index: 1 });
    expect(prompter.asked).toEqual(['Enter a number (1-3)', 'Enter a number (1-3)', 'Enter a number (1-3)']);
    expect(prompter.output).toContain('  ✗ "7" is not a valid choice');
    expect(prompter.output.slice(0, 4)).toEqual(['\nPick one:', '  1. alpha', '  2. beta', '  3. gamma']);
  });

  it('returns back only when allowed', async () => {
    const prompter = new ScriptedPrompter(['b']);

    const result = await chooseFromList(prompter, { title: 'Pick:', items, label: s => s, allowBack: true });

    expect(result).toEqual({ action: 'back' });
    expect(prompter.asked).toEqual(["Enter a number (1-3) or 'b' to go back"]);
  });

  it('treats b as invalid without allowBack', async () => {
    const prompter = new ScriptedPrompter(['b', '1']);

    const result = await chooseFromList(prompter, { title: 'Pick:', items, label: s => s });

    expect(result).toEqual({ action: 'selected', value: 'alpha', index: 0 });
  });

  it('raises a fatal error when the retry budget runs out', async () => {
    const prompter = new ScriptedPrompter(['9', '9']);

    const pending = chooseFromList(prompter, { title: 'Pick:', items, label: s => s, retryLimit: 2 });

    await expect(pending).rejects.toBeInstanceOf(FatalError);
    await expect(pending).rejects.toMatchObject({ kind: 'retry-budget-exhausted' });
  });
});

describe('confirm', () => {
  it('takes the default on blank input', async () => {
    const prompter = new ScriptedPrompter(['']);

    await expect(confirm(prompter, 'Continue?', { default: true })).resolves.toBe(true);
    expect(prompter.asked).toEqual(['Continue? (Y/n)']);
  });

  it('re-asks until y or n', async () => {
    const prompter = new ScriptedPrompter(['maybe', 'no']);

    await expect(confirm(prompter, 'Continue?', { default: true })).resolves.toBe(false);
    expect(prompter.output).toEqual(['  ✗ Please answer y or n']);
  });
});

describe('askValidated', () => {
  const digits = (value: string) => (/^\d+$/.test(value) ? null : 'Digits only');

  it('shows the default and uses it on blank input', async () => {
    const prompter = new ScriptedPrompter(['']);

    await expect(askValidated(prompter, 'Count', digits, { default: '2' })).resolves.toBe('2');
    expect(prompter.asked).toEqual(['Count [2]']);
  });

  it('reports the validation problem and re-prompts', async () => {
    const prompter = new ScriptedPrompter(['abc', '', '42']);

    await expect(askValidated(prompter, 'Count', digits)).resolves.toBe('42');
    expect(prompter.output).toEqual(['  ✗ Digits only', '  ✗ A value is required']);
  });
});

describe('askSecretTwice', () => {
  it('repeats until both entries match', async () => {
    const prompter = new ScriptedPrompter([], ['first-secret', 'other-secret', 'test-secret', 'test-secret']);

    await expect(askSecretTwice(prompter, 'Password')).resolves.toBe('test-secret');
    expect(prompter.asked).toEqual(['Password', 'Confirm password', 'Password', 'Confirm password']);
    expect(prompter.output).toEqual(['  ✗ Entries do not match']);
  });
});
