import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { CommandRunner } from '../environment/command-runner.js';
import type { TemplateDocument, TemplateParameterValues } from '../clients/types.js';

const templateSchema = z
  .object({
    $schema: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
    resources: z.union([z.array(z.unknown()), z.record(z.unknown())]),
  })
  .passthrough();

export class TemplateLoadError extends Error {
  constructor(readonly templatePath: string, message: string) {
    super(`Cannot load template ${templatePath}: ${message}`);
    this.name = 'TemplateLoadError';
  }
}

function parseTemplate(templatePath: string, text: string): TemplateDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new TemplateLoadError(templatePath, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const result = templateSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new TemplateLoadError(templatePath, `${issue.path.join('.') || 'template'}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Read a template as an ARM JSON document; .bicep files are compiled by the Azure CLI
 */
export async function loadTemplate(
  templatePath: string,
  runner: CommandRunner,
  azCommand = 'az'
): Promise<TemplateDocument> {
  if (path.extname(templatePath).toLowerCase() !== '.bicep') {
    return parseTemplate(templatePath, await fs.readFile(templatePath, 'utf8'));
  }

  const build = await runner.run(azCommand, ['bicep', 'build', '--file', templatePath, '--stdout']);
  if (!build.success) {
    throw new TemplateLoadError(templatePath, build.stderr.trim() || 'bicep build failed');
  }
  return parseTemplate(templatePath, build.stdout);
}

/**
 * Keep only the parameters the template declares. Returns the kept values and
 * the names that were dropped.
 */
export function selectDeclaredParameters(
  template: TemplateDocument,
  values: TemplateParameterValues
): { parameters: TemplateParameterValues; dropped: string[] } {
  const declared = template.parameters;
  if (typeof declared !== 'object' || declared === null) {
    return { parameters: { ...values }, dropped: [] };
  }

  const parameters: TemplateParameterValues = {};
  const dropped: string[] = [];
  for (const [name, value] of Object.entries(values)) {
    if (name in declared) {
      parameters[name] = value;
    } else {
      dropped.push(name);
    }
  }
  return { parameters, dropped };
}
