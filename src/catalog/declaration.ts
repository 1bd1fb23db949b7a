/**
 * Declaration Loader
 *
 * Reads the per-project declaration file (catalogue.json by default).
 */

import * as path from 'path';
import { z } from 'zod';
import { readJsonFile } from '../tools/filesystem.js';
import type { ProjectFields, ProjectStatus } from './types.js';

const PROJECT_STATUSES: readonly ProjectStatus[] = ['active', 'archived', 'unknown'];

// Unknown keys are stripped; recognized keys must have the right type
export const DeclarationSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  oneLiner: z.string().optional(),
  description: z.string().optional(),
  kind: z.string().optional(),
  categories: z.array(z.string()).optional(),
  tags: z.array(z.string()).optional(),
  status: z.string().optional(),
});

export type Declaration = z.infer<typeof DeclarationSchema>;

export type DeclarationResult =
  | { kind: 'absent' }
  | { kind: 'invalid'; path: string; message: string }
  | { kind: 'ok'; path: string; declaration: Declaration };

export function loadDeclaration(projectDir: string, fileName: string): DeclarationResult {
  const filePath = path.join(projectDir, fileName);
  const raw = readJsonFile(filePath);

  if (raw.kind === 'absent') {
    return { kind: 'absent' };
  }
  if (raw.kind === 'invalid') {
    return { kind: 'invalid', path: filePath, message: raw.message };
  }

  const parsed = DeclarationSchema.safeParse(raw.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return {
      kind: 'invalid',
      path: filePath,
      message: `${where}${issue?.message ?? 'invalid declaration'}`,
    };
  }

  return { kind: 'ok', path: filePath, declaration: parsed.data };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function uniqueStrings(values: string[] | undefined): string[] {
  const result: string[] = [];
  for (const value of values ?? []) {
    const trimmed = value.trim();
    if (trimmed && !result.includes(trimmed)) {
      result.push(trimmed);
    }
  }
  return result;
}

export function normalizeStatus(value: string | undefined): ProjectStatus {
  const lowered = value?.trim().toLowerCase();
  return PROJECT_STATUSES.find(status => status === lowered) ?? 'unknown';
}

/**
 * Apply documented defaults. The folder name stands in for a missing id or title.
 */
export function toProjectFields(declaration: Declaration, folderName: string): ProjectFields {
  return {
    id: nonBlank(declaration.id) ?? folderName,
    title: nonBlank(declaration.title) ?? folderName,
    oneLiner: nonBlank(declaration.oneLiner) ?? nonBlank(declaration.description) ?? '',
    kind: nonBlank(declaration.kind) ?? 'project',
    categories: uniqueStrings(declaration.categories),
    tags: uniqueStrings(declaration.tags),
    status: normalizeStatus(declaration.status),
  };
}
