import fs from 'fs';
import path from 'path';
import { chooseFromList, confirm, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import { FatalError } from '../utils/errors.js';

export type TemplateKind = 'core' | 'session-host';

export interface TemplateFile {
  name: string;
  path: string;
}

const TEMPLATE_EXTENSIONS = new Set(['.bicep', '.json']);

const SESSION_HOST_PATTERN = /session[-_]?host/i;
const CORE_PATTERN = /(core|infra)/i;

/**
 * List infrastructure templates in a directory, sorted by file name
 */
export function listTemplates(templateDir: string): TemplateFile[] {
  if (!fs.existsSync(templateDir)) return [];

  return fs
    .readdirSync(templateDir)
    .filter(file => TEMPLATE_EXTENSIONS.has(path.extname(file).toLowerCase()))
    .filter(file => !file.toLowerCase().endsWith('.parameters.json'))
    .sort((a, b) => a.localeCompare(b))
    .map(file => ({ name: file, path: path.join(templateDir, file) }));
}

export function matchesKind(fileName: string, kind: TemplateKind): boolean {
  if (kind === 'session-host') return SESSION_HOST_PATTERN.test(fileName);
  return CORE_PATTERN.test(fileName) && !SESSION_HOST_PATTERN.test(fileName);
}

export function suggestTemplates(templates: TemplateFile[], kind: TemplateKind): TemplateFile[] {
  return templates.filter(t => matchesKind(t.name, kind));
}

function samePath(a: string, b: string): boolean {
  return path.resolve(a).toLowerCase() === path.resolve(b).toLowerCase();
}

export interface ChooseTemplateOptions {
  templates: TemplateFile[];
  kind: TemplateKind;
  /** Paths left out of the listing (the previous run's template in override mode) */
  excludedPaths?: string[];
  retryLimit?: number;
}

/**
 * One heuristic match is offered for confirmation; otherwise (or when
 * declined) the full listing is shown
 */
export async function chooseTemplate(prompter: Prompter, options: ChooseTemplateOptions): Promise<TemplateFile> {
  const { templates, kind } = options;
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
  const excluded = options.excludedPaths ?? [];

  if (templates.length === 0) {
    throw new FatalError('prerequisite-missing', `No ${kind} templates (.bicep or .json) were found`);
  }

  const filtered = templates.filter(t => !excluded.some(p => samePath(p, t.path)));
  // Excluding the only template would leave nothing to choose
  const available = filtered.length > 0 ? filtered : templates;

  const suggestions = suggestTemplates(available, kind);
  if (suggestions.length === 1) {
    const [suggested] = suggestions;
    if (await confirm(prompter, `Use ${kind} template "${suggested.name}"?`, { default: true, retryLimit })) {
      return suggested;
    }
  }

  const result = await chooseFromList(prompter, {
    title: `Select the ${kind} template:`,
    items: available,
    label: t => t.name,
    retryLimit,
  });
  if (result.action !== 'selected') {
    throw new FatalError('invalid-selection', 'No template selected');
  }
  return result.value;
}
