/**
 * Directory group resolution for the standard and elevated roles: search the
 * live directory by substring, or create a new security group.
 */

import { askValidated, chooseFromList, confirm, DEFAULT_RETRY_LIMIT } from '../prompts/menu.js';
import type { Prompter } from '../prompts/prompter.js';
import type { DirectoryClient, DirectoryGroup } from '../clients/types.js';
import type { DirectoryGroupRef, GroupRole } from '../state/deployment-config.js';
import { FatalError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_GROUP_NAMES: Record<GroupRole, string> = {
  standard: 'PAW-Users',
  elevated: 'PAW-Admins',
};

const ROLE_LABELS: Record<GroupRole, string> = {
  standard: 'standard users',
  elevated: 'elevated admins',
};

export type GroupResolution =
  | { action: 'resolved'; group: DirectoryGroupRef }
  | { action: 'back' };

type SearchResult =
  | { action: 'selected'; group: DirectoryGroup }
  | { action: 'back' };

type SearchItem = { kind: 'group'; group: DirectoryGroup } | { kind: 'search-again' };

export interface GroupResolverOptions {
  role: GroupRole;
  defaultName?: string;
  retryLimit?: number;
}

function toRef(group: DirectoryGroup, role: GroupRole): DirectoryGroupRef {
  return { id: group.id, displayName: group.displayName, role };
}

/**
 * Substring search loop. Zero matches re-prompts for a new substring; the
 * selection menu offers a fresh search or going back.
 */
export async function searchForGroup(
  prompter: Prompter,
  directory: DirectoryClient,
  role: GroupRole,
  retryLimit = DEFAULT_RETRY_LIMIT
): Promise<SearchResult> {
  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const substring = await askValidated(
      prompter,
      `Search text for the ${ROLE_LABELS[role]} group`,
      () => null,
      { retryLimit }
    );

    const matches = await directory.searchGroups(substring);
    if (matches.length === 0) {
      prompter.say(`  ✗ No groups match "${substring}" - try another search`);
      continue;
    }

    const items: SearchItem[] = [
      ...matches.map((group): SearchItem => ({ kind: 'group', group })),
      { kind: 'search-again' },
    ];
    const choice = await chooseFromList(prompter, {
      title: `Groups matching "${substring}":`,
      items,
      label: item => (item.kind === 'group' ? `${item.group.displayName} (${item.group.id})` : 'Search again'),
      allowBack: true,
      retryLimit,
    });

    if (choice.action === 'back') return { action: 'back' };
    if (choice.value.kind === 'group') return { action: 'selected', group: choice.value.group };
  }

  throw new FatalError(
    'retry-budget-exhausted',
    `No ${ROLE_LABELS[role]} group selected after ${retryLimit} searches - aborting`
  );
}

async function createGroup(
  prompter: Prompter,
  directory: DirectoryClient,
  logger: Logger,
  role: GroupRole,
  defaultName: string,
  retryLimit: number
): Promise<DirectoryGroup> {
  const displayName = await askValidated(
    prompter,
    `Name for the new ${ROLE_LABELS[role]} group`,
    value => (value.length > 256 ? 'Group names are at most 256 characters' : null),
    { default: defaultName, retryLimit }
  );

  const existing = (await directory.searchGroups(displayName)).find(
    g => g.displayName.toLowerCase() === displayName.toLowerCase()
  );
  if (existing && await confirm(prompter, `A group named "${existing.displayName}" already exists. Use it?`, { default: true, retryLimit })) {
    logger.info(`Using existing group ${existing.displayName} (${existing.id})`);
    return existing;
  }

  const description = role === 'elevated'
    ? 'Privileged access workstation administrators'
    : 'Privileged access workstation users';
  const group = await directory.createGroup(displayName, description);
  logger.success(`Created group ${group.displayName} (${group.id})`);
  return group;
}

export async function resolveGroup(
  prompter: Prompter,
  directory: DirectoryClient,
  logger: Logger,
  options: GroupResolverOptions
): Promise<GroupResolution> {
  const { role } = options;
  const retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
  const defaultName = options.defaultName ?? DEFAULT_GROUP_NAMES[role];

  for (let attempt = 1; attempt <= retryLimit; attempt++) {
    const choice = await chooseFromList(prompter, {
      title: `Directory group for ${ROLE_LABELS[role]}:`,
      items: ['search', 'create'] as const,
      label: item => (item === 'search' ? 'Search for an existing group' : 'Create a new group'),
      allowBack: true,
      retryLimit,
    });
    if (choice.action === 'back') return { action: 'back' };

    if (choice.value === 'create') {
      const group = await createGroup(prompter, directory, logger, role, defaultName, retryLimit);
      return { action: 'resolved', group: toRef(group, role) };
    }

    const result = await searchForGroup(prompter, directory, role, retryLimit);
    if (result.action === 'selected') {
      logger.info(`Selected ${ROLE_LABELS[role]} group ${result.group.displayName} (${result.group.id})`);
      return { action: 'resolved', group: toRef(result.group, role) };
    }
  }

  throw new FatalError(
    'retry-budget-exhausted',
    `No ${ROLE_LABELS[role]} group resolved after ${retryLimit} attempts - aborting`
  );
}
