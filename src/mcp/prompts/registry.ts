/**
 * Prompt registration on the MCP server
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '../../lib/logger';
import { renderTemplate, type PromptDefinition } from './loader';

export type PromptArgsShape = Record<string, z.ZodString | z.ZodOptional<z.ZodString>>;

export function promptArgsShape(prompt: PromptDefinition): PromptArgsShape {
  const shape: PromptArgsShape = {};
  for (const parameter of prompt.parameters) {
    const field = z.string().describe(parameter.description);
    shape[parameter.name] = parameter.required ? field : field.optional();
  }
  return shape;
}

/**
 * Render a prompt into a single user message. Prompts without parameters
 * are sent as written.
 */
export function renderPrompt(
  prompt: PromptDefinition,
  args: Record<string, string | undefined>,
): GetPromptResult {
  const text =
    prompt.parameters.length === 0 ? prompt.template.trim() : renderTemplate(prompt.template, args);
  return {
    description: prompt.description,
    messages: [{ role: 'user', content: { type: 'text', text } }],
  };
}

/**
 * Register prompts; a name registered earlier wins and later duplicates are skipped
 */
export function registerPrompts(
  server: McpServer,
  prompts: readonly PromptDefinition[],
  logger: Logger,
): string[] {
  const registered = new Set<string>();
  for (const prompt of prompts) {
    if (registered.has(prompt.name)) {
      logger.warn({ prompt: prompt.name }, 'Duplicate prompt name, skipping');
      continue;
    }
    if (prompt.parameters.length === 0) {
      // Argument-less prompts get no schema so requests without arguments validate
      server.registerPrompt(prompt.name, { description: prompt.description }, () =>
        renderPrompt(prompt, {}),
      );
    } else {
      server.registerPrompt(
        prompt.name,
        { description: prompt.description, argsSchema: promptArgsShape(prompt) },
        (args) => renderPrompt(prompt, args),
      );
    }
    registered.add(prompt.name);
  }
  logger.debug({ count: registered.size }, 'Prompts registered');
  return [...registered];
}
