import { TeradataClient } from '../../src/lib/teradata';
import type { ConnectionSettings } from '../../src/lib/database-uri';
import type { ToolContext } from '../../src/mcp/context/types';
import type { ToolResponse } from '../../src/domain/types';
import { createSessionState } from '../../src/domain/types';
import { FakeConnection } from './fake-connection';
import { createSilentLogger } from './logger';

export const TEST_SETTINGS: ConnectionSettings = {
  host: 'td.example.test',
  user: 'tester',
  password: 'test-secret',
};

export function createTestContext(
  connection: FakeConnection = new FakeConnection(),
  overrides: Partial<ToolContext> = {},
): ToolContext {
  const logger = overrides.logger ?? createSilentLogger();
  return {
    logger,
    database: new TeradataClient(TEST_SETTINGS, async () => connection, logger),
    vectorStore: undefined,
    session: createSessionState(),
    settings: { faqTable: 'FAQ_DEMO' },
    ...overrides,
  };
}

export function textOf(response: ToolResponse): string {
  return response.content.map((part) => part.text).join('\n');
}

/** Parse the JSON envelope of a successful tool response */
export function envelopeOf(response: ToolResponse): {
  status: unknown;
  metadata: Record<string, unknown>;
  results: unknown;
} {
  const parsed: unknown = JSON.parse(textOf(response));
  if (typeof parsed !== 'object' || parsed === null || !('results' in parsed)) {
    throw new Error(`Not a result envelope: ${textOf(response)}`);
  }
  const metadata = 'metadata' in parsed ? parsed.metadata : {};
  return {
    status: 'status' in parsed ? parsed.status : undefined,
    metadata: typeof metadata === 'object' && metadata !== null ? { ...metadata } : {},
    results: parsed.results,
  };
}
