/**
 * Custom tool and prompt definition tests
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createCustomPrompt,
  createCustomQueryTool,
  loadCustomDefinitions,
  parseCustomDefinitions,
} from '../../../src/mcp/custom/loader';
import { renderPrompt } from '../../../src/mcp/prompts/registry';
import { FakeConnection, result } from '../../__support__/fake-connection';
import { createTestContext, envelopeOf } from '../../__support__/context';
import { createCapturingLogger, createSilentLogger, messages } from '../../__support__/logger';

const DEFINITIONS = `
- type: tool
  name: sales_topCustomers
  description: Top customers by revenue
  sql: SELECT TOP 10 * FROM sales.customers ORDER BY revenue DESC
- type: prompt
  name: sales_review
  description: Quarterly review
  prompt: Review the sales figures for {{quarter}}.
- type: resource
  name: ignored
- type: tool
  name: 9bad
  sql: SELECT 1
`;

describe('parseCustomDefinitions', () => {
  it('should create tools and prompts and skip the rest', () => {
    const { logger, records } = createCapturingLogger();

    const definitions = parseCustomDefinitions(DEFINITIONS, 'sales_tools.yaml', logger);

    expect(definitions.tools.map((tool) => [tool.name, tool.category, tool.description])).toEqual([
      ['sales_topCustomers', 'custom', 'Top customers by revenue'],
    ]);
    expect(definitions.prompts).toEqual([
      {
        name: 'sales_review',
        category: 'custom',
        description: 'Quarterly review',
        parameters: [],
        template: 'Review the sales figures for {{quarter}}.',
      },
    ]);
    expect(messages(records)).toEqual([
      'Created custom tool',
      'Created custom prompt',
      'Custom yaml type is unknown, skipping',
      'Invalid custom definition, skipping',
    ]);
  });

  it('should accept an empty document', () => {
    expect(parseCustomDefinitions('', 'empty_tools.yaml', createSilentLogger())).toEqual({
      tools: [],
      prompts: [],
    });
  });

  it('should reject a document that is not a list', () => {
    const { logger, records } = createCapturingLogger();

    const definitions = parseCustomDefinitions('name: x\n', 'map_tools.yaml', logger);

    expect(definitions.tools).toHaveLength(0);
    expect(messages(records)).toEqual(['Custom definitions file must contain a list, skipping']);
  });
});

describe('custom query tools', () => {
  it('should run the declared SQL without arguments', async () => {
    const connection = new FakeConnection().queueResult(result(['customer', 'revenue'], ['acme', 100]));
    const tool = createCustomQueryTool('sales_top', 'SELECT customer, revenue FROM sales.top', 'Top');

    const response = await tool.invoke({}, createTestContext(connection));

    expect(connection.sql).toEqual(['SELECT customer, revenue FROM sales.top']);
    expect(envelopeOf(response).results).toEqual([{ customer: 'acme', revenue: 100 }]);
  });

  it('should send custom prompts verbatim', () => {
    const prompt = createCustomPrompt('raw', 'Use {{braces}} as written', 'Raw');

    expect(renderPrompt(prompt, {}).messages[0]?.content).toEqual({
      type: 'text',
      text: 'Use {{braces}} as written',
    });
  });
});

describe('loadCustomDefinitions', () => {
  let directory: string;

  beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'custom-tools-'));
    await writeFile(
      join(directory, 'b_tools.yaml'),
      '- type: tool\n  name: b_tool\n  sql: SELECT 2\n',
    );
    await writeFile(
      join(directory, 'a_tools.yaml'),
      '- type: tool\n  name: a_tool\n  sql: SELECT 1\n- type: prompt\n  name: a_prompt\n  prompt: Hello\n',
    );
    await writeFile(join(directory, 'c_tools.yaml'), '- type: tool\n  name: [broken\n');
    await writeFile(join(directory, 'notes.yaml'), '- type: tool\n  name: skipped\n  sql: SELECT 3\n');
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should load *_tools.yaml files in name order', async () => {
    const { logger, records } = createCapturingLogger();

    const definitions = await loadCustomDefinitions(directory, logger);

    expect(definitions.tools.map((tool) => tool.name)).toEqual(['a_tool', 'b_tool']);
    expect(definitions.prompts.map((prompt) => prompt.name)).toEqual(['a_prompt']);
    expect(messages(records)).toContain('Failed to load custom definitions file');
    expect(records.at(-1)).toMatchObject({
      msg: 'Custom definitions loaded',
      component: 'CustomToolLoader',
      files: 3,
      tools: 2,
      prompts: 1,
    });
  });

  it('should skip a missing directory', async () => {
    const { logger, records } = createCapturingLogger();

    const definitions = await loadCustomDefinitions(join(directory, 'absent'), logger);

    expect(definitions).toEqual({ tools: [], prompts: [] });
    expect(messages(records)).toEqual(['Custom tools directory is not readable, skipping']);
  });
});
