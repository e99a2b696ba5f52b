/**
 * Simple YAML Prompt Loader
 *
 * Loads prompt definitions from YAML files organized by category
 * (`<directory>/<category>/<name>.yaml`).
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import type { Logger } from '../../lib/logger';
import { Failure, Success, type Result } from '../../domain/types';

const parameterSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  required: z.boolean().default(true),
});

const promptFileSchema = z.object({
  metadata: z.object({
    name: z.string().min(1),
    category: z.string().min(1),
    description: z.string().min(1),
    version: z.coerce.string().default('1.0'),
    parameters: z.array(parameterSchema).default([]),
  }),
  template: z.string().min(1),
});

export type ParameterSpec = z.infer<typeof parameterSchema>;

/**
 * A prompt ready to be rendered with string arguments
 */
export interface PromptDefinition {
  name: string;
  category: string;
  description: string;
  parameters: ParameterSpec[];
  template: string;
}

/**
 * Replace `{{name}}` placeholders; unknown names render as empty strings
 */
export function renderTemplate(template: string, params: Record<string, unknown>): string {
  return template
    .replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => {
      const value = params[key];
      return value !== undefined && value !== null ? String(value) : '';
    })
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function parsePromptFile(content: string): Result<PromptDefinition> {
  let raw: unknown;
  try {
    raw = load(content);
  } catch (error) {
    return Failure(
      `Failed to parse prompt file: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  const parsed = promptFileSchema.safeParse(raw);
  if (!parsed.success) {
    return Failure(
      `Invalid prompt file structure: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
  }
  const { metadata, template } = parsed.data;
  return Success({
    name: metadata.name,
    category: metadata.category,
    description: metadata.description,
    parameters: metadata.parameters,
    template,
  });
}

function isYaml(file: string): boolean {
  const extension = extname(file).toLowerCase();
  return extension === '.yaml' || extension === '.yml';
}

/**
 * Load every prompt under a directory. Files that fail to parse are logged
 * and skipped.
 */
export async function loadPromptsFromDirectory(
  directory: string,
  logger: Logger,
): Promise<Result<PromptDefinition[]>> {
  const log = logger.child({ component: 'PromptLoader' });
  try {
    log.info({ directory }, 'Loading prompts from directory');
    const prompts: PromptDefinition[] = [];

    const entries = (await readdir(directory)).sort();
    for (const category of entries) {
      const categoryPath = join(directory, category);
      if (!(await stat(categoryPath)).isDirectory()) {
        continue;
      }
      const files = (await readdir(categoryPath)).filter(isYaml).sort();
      for (const file of files) {
        const filePath = join(categoryPath, file);
        const result = parsePromptFile(await readFile(filePath, 'utf8'));
        if (result.ok) {
          prompts.push(result.value);
          log.debug({ name: result.value.name, category }, 'Loaded prompt');
        } else {
          log.warn({ file: filePath, error: result.error }, 'Failed to load prompt file');
        }
      }
    }

    log.info({ totalLoaded: prompts.length }, 'Prompt loading completed');
    return Success(prompts);
  } catch (error) {
    const message = `Failed to load prompts: ${error instanceof Error ? error.message : String(error)}`;
    log.error({ directory }, message);
    return Failure(message);
  }
}
