/**
 * Custom tools and prompts declared in `*_tools.yaml` files
 *
 * Each file holds a list of entries:
 *
 * ```yaml
 * - type: tool
 *   name: sales_topCustomers
 *   description: Top customers by revenue
 *   sql: SELECT TOP 10 * FROM sales.customers ORDER BY revenue DESC
 * - type: prompt
 *   name: sales_review
 *   prompt: Review last quarter's sales figures...
 * ```
 *
 * Tools run their SQL through base_readQuery without parameters; prompts
 * return their text as a single user message.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { CUSTOM_TOOLS_SUFFIX } from '../../config/defaults';
import type { Logger } from '../../lib/logger';
import { readQuery } from '../../tools/base';
import type { PromptDefinition } from '../prompts/loader';
import { executeDbTool } from '../tools/executor';
import { defineTool, type Tool } from '../tools/tool-definition';

const nameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_.-]*$/, 'must start with a letter and use only letters, digits, _ . -');

const customToolSchema = z.object({
  type: z.literal('tool'),
  name: nameSchema,
  sql: z.string().min(1),
  description: z.string().default(''),
});

const customPromptSchema = z.object({
  type: z.literal('prompt'),
  name: nameSchema,
  prompt: z.string().min(1),
  description: z.string().default(''),
});

const customEntrySchema = z.discriminatedUnion('type', [customToolSchema, customPromptSchema]);

export type CustomEntry = z.infer<typeof customEntrySchema>;

export interface CustomDefinitions {
  tools: Tool[];
  prompts: PromptDefinition[];
}

export function createCustomQueryTool(name: string, sql: string, description: string): Tool {
  return defineTool({
    name,
    description,
    category: 'custom',
    shape: {},
    run: (_params, context) =>
      executeDbTool(context, name, (connection) =>
        readQuery(connection, { sql }, context.logger.child({ tool: name })),
      ),
  });
}

export function createCustomPrompt(name: string, prompt: string, description: string): PromptDefinition {
  return {
    name,
    category: 'custom',
    description,
    parameters: [],
    template: prompt,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn the entries of one YAML document into tools and prompts
 */
export function parseCustomDefinitions(
  content: string,
  source: string,
  logger: Logger,
): CustomDefinitions {
  const definitions: CustomDefinitions = { tools: [], prompts: [] };
  const raw: unknown = load(content);
  if (raw === undefined || raw === null) {
    return definitions;
  }
  if (!Array.isArray(raw)) {
    logger.warn({ source }, 'Custom definitions file must contain a list, skipping');
    return definitions;
  }

  raw.forEach((item: unknown, index) => {
    if (isRecord(item) && item.type !== 'tool' && item.type !== 'prompt') {
      logger.info({ source, index, type: item.type }, 'Custom yaml type is unknown, skipping');
      return;
    }
    const parsed = customEntrySchema.safeParse(item);
    if (!parsed.success) {
      logger.warn(
        { source, index, issues: parsed.error.issues.map((issue) => issue.message) },
        'Invalid custom definition, skipping',
      );
      return;
    }
    const entry = parsed.data;
    if (entry.type === 'tool') {
      definitions.tools.push(createCustomQueryTool(entry.name, entry.sql, entry.description));
      logger.info({ source, name: entry.name }, 'Created custom tool');
    } else {
      definitions.prompts.push(createCustomPrompt(entry.name, entry.prompt, entry.description));
      logger.info({ source, name: entry.name }, 'Created custom prompt');
    }
  });
  return definitions;
}

/**
 * Load every `*_tools.yaml` file in a directory, in name order
 */
export async function loadCustomDefinitions(
  directory: string,
  logger: Logger,
): Promise<CustomDefinitions> {
  const log = logger.child({ component: 'CustomToolLoader' });
  const definitions: CustomDefinitions = { tools: [], prompts: [] };

  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    log.warn(
      { directory, error: error instanceof Error ? error.message : String(error) },
      'Custom tools directory is not readable, skipping',
    );
    return definitions;
  }
  const files = entries.filter((file) => file.endsWith(CUSTOM_TOOLS_SUFFIX)).sort();

  for (const file of files) {
    const path = join(directory, file);
    try {
      const loaded = parseCustomDefinitions(await readFile(path, 'utf8'), file, log);
      definitions.tools.push(...loaded.tools);
      definitions.prompts.push(...loaded.prompts);
    } catch (error) {
      log.error(
        { file: path, error: error instanceof Error ? error.message : String(error) },
        'Failed to load custom definitions file',
      );
    }
  }

  log.info(
    { directory, files: files.length, tools: definitions.tools.length, prompts: definitions.prompts.length },
    'Custom definitions loaded',
  );
  return definitions;
}
