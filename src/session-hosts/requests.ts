import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { askValidated, chooseFromList, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type { GroupRole } from '../state/deployment-config.js';
import { FatalError } from '../utils/errors.js';

export interface SessionHostRequest {
  firstName: string;
  lastName: string;
  upn: string;
  vmName: string;
  /** Directory groups the user is added to */
  roles: GroupRole[];
}

export const MAX_HOSTS_PER_RUN = 4;

// Windows computer names (NetBIOS) are limited to 15 characters
export const VM_NAME_MAX_LENGTH = 15;

const UPN_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function deriveVmName(prefix: string, firstName: string, lastName: string): string {
  return `${prefix}${firstName}${lastName}`
    .replace(/[^A-Za-z0-9]/g, '')
    .slice(0, VM_NAME_MAX_LENGTH)
    .toLowerCase();
}

export function validateUpn(value: string): string | null {
  return UPN_PATTERN.test(value) ? null : `"${value}" is not a user principal name (user@domain)`;
}

const ROLE_CHOICES: ReadonlyArray<{ label: string; roles: GroupRole[] }> = [
  { label: 'Standard users group', roles: ['standard'] },
  { label: 'Elevated admins group', roles: ['elevated'] },
  { label: 'Both groups', roles: ['standard', 'elevated'] },
  { label: 'Neither', roles: [] },
];

/**
 * Role column values: standard, elevated, both, none (or blank)
 */
export function parseRoles(value: string): GroupRole[] | null {
  switch (value.trim().toLowerCase()) {
    case 'standard':
      return ['standard'];
    case 'elevated':
      return ['elevated'];
    case 'both':
      return ['standard', 'elevated'];
    case '':
    case 'none':
      return [];
    default:
      return null;
  }
}

function nameValidator(label: string) {
  return (value: string): string | null =>
    /[A-Za-z0-9]/.test(value) ? null : `${label} must contain at least one letter or digit`;
}

/**
 * Interactively collect 1-4 requests. Names that would derive a VM name
 * already used in this batch are asked again.
 */
export async function collectRequests(
  prompter: Prompter,
  prefix: string,
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<SessionHostRequest[]> {
  const countText = await askValidated(
    prompter,
    `How many session hosts (1-${MAX_HOSTS_PER_RUN})`,
    value => {
      const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
      return n >= 1 && n <= MAX_HOSTS_PER_RUN ? null : `Enter a number from 1 to ${MAX_HOSTS_PER_RUN}`;
    },
    { default: '1', retryLimit }
  );
  const count = parseInt(countText, 10);

  const requests: SessionHostRequest[] = [];
  let attempts = 0;
  while (requests.length < count) {
    if (++attempts > count + retryLimit) {
      throw new FatalError('retry-budget-exhausted', 'Could not collect unique session host requests - aborting');
    }

    const n = requests.length + 1;
    prompter.say(`\nSession host ${n} of ${count}`);
    const firstName = await askValidated(prompter, 'First name', nameValidator('First name'), { retryLimit });
    const lastName = await askValidated(prompter, 'Last name', nameValidator('Last name'), { retryLimit });
    const upn = await askValidated(prompter, 'User principal name', validateUpn, { retryLimit });

    const vmName = deriveVmName(prefix, firstName, lastName);
    if (requests.some(r => r.vmName === vmName)) {
      prompter.say(`  ✗ VM name ${vmName} is already used in this batch - enter this user again`);
      continue;
    }

    const roles = await chooseFromList(prompter, {
      title: `Directory groups for ${upn}:`,
      items: ROLE_CHOICES,
      label: c => c.label,
      retryLimit,
    });

    requests.push({
      firstName,
      lastName,
      upn,
      vmName,
      roles: roles.action === 'selected' ? [...roles.value.roles] : [],
    });
    prompter.say(`  ✓ VM name: ${vmName}`);
  }

  return requests;
}

const csvRowSchema = z.object({
  firstName: z.string().regex(/[A-Za-z0-9]/, 'must contain a letter or digit'),
  lastName: z.string().regex(/[A-Za-z0-9]/, 'must contain a letter or digit'),
  upn: z.string().regex(UPN_PATTERN, 'must be user@domain'),
  roles: z.string().optional().default(''),
});

/**
 * Read requests from a CSV with columns firstName,lastName,upn,roles
 */
export async function loadRequestsFromCsv(csvPath: string, prefix: string): Promise<SessionHostRequest[]> {
  const content = await fs.readFile(csvPath, 'utf-8');
  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  const rows = z.array(z.unknown()).parse(records);

  if (rows.length === 0) {
    throw new Error(`${csvPath} contains no session host rows`);
  }
  if (rows.length > MAX_HOSTS_PER_RUN) {
    throw new Error(`${csvPath} has ${rows.length} rows; at most ${MAX_HOSTS_PER_RUN} session hosts are provisioned per run`);
  }

  const requests: SessionHostRequest[] = [];
  rows.forEach((raw, i) => {
    const line = i + 2; // header is line 1
    const result = csvRowSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(`${csvPath} line ${line}: ${issue.path.join('.')} ${issue.message}`);
    }

    const row = result.data;
    const roles = parseRoles(row.roles);
    if (roles === null) {
      throw new Error(`${csvPath} line ${line}: roles must be standard, elevated, both or none`);
    }

    const vmName = deriveVmName(prefix, row.firstName, row.lastName);
    if (requests.some(r => r.vmName === vmName)) {
      throw new Error(`${csvPath} line ${line}: VM name ${vmName} duplicates an earlier row`);
    }

    requests.push({ firstName: row.firstName, lastName: row.lastName, upn: row.upn, vmName, roles });
  });

  return requests;
}
