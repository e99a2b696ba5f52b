import { describe, it, expect, jest } from '@jest/globals';
import { z } from 'zod';
import {
  VECTOR_STORE_UNAVAILABLE,
  executeDbTool,
  executeVectorStoreTool,
} from '../../../src/mcp/tools/executor';
import { defineTool } from '../../../src/mcp/tools/tool-definition';
import {
  formatErrorResponse,
  formatTextResponse,
  responseText,
} from '../../../src/mcp/tools/response-formatter';
import { Failure, Success, type Result } from '../../../src/domain/types';
import { ValidationError } from '../../../src/lib/errors';
import type { VectorStore } from '../../../src/lib/vector-store';
import { FakeConnection } from '../../__support__/fake-connection';
import { createTestContext, textOf } from '../../__support__/context';

function stubStore(): VectorStore & { refresh: jest.Mock<() => Promise<void>> } {
  return {
    name: 'faq_store',
    similaritySearch: async () => [],
    refresh: jest.fn<() => Promise<void>>(async () => undefined),
  };
}

describe('response formatting', () => {
  it('should pretty-print JSON text', () => {
    expect(textOf(formatTextResponse('{"a":[1]}'))).toBe('{\n  "a": [\n    1\n  ]\n}');
  });

  it('should pass other text through', () => {
    expect(formatTextResponse('plain answer')).toEqual({
      content: [{ type: 'text', text: 'plain answer' }],
    });
  });

  it('should prefix errors and flag them', () => {
    expect(formatErrorResponse('boom')).toEqual({
      content: [{ type: 'text', text: 'Error: boom' }],
      isError: true,
    });
  });

  it('should join the text parts of a response', () => {
    expect(
      responseText({
        content: [
          { type: 'text', text: 'a' },
          { type: 'text', text: 'b' },
        ],
      }),
    ).toBe('a\nb');
  });
});

describe('defineTool', () => {
  const tool = defineTool({
    name: 'demo_echo',
    description: 'Echo',
    category: 'custom',
    shape: { count: z.coerce.number().int().default(1) },
    run: async (params) => formatTextResponse(`count=${params.count}`),
  });

  it('should apply defaults before running', async () => {
    expect(textOf(await tool.invoke(undefined, createTestContext()))).toBe('count=1');
  });

  it('should coerce and validate arguments', async () => {
    expect(textOf(await tool.invoke({ count: '3' }, createTestContext()))).toBe('count=3');
    await expect(tool.invoke({ count: 'many' }, createTestContext())).rejects.toThrow(
      ValidationError,
    );
  });
});

describe('executeDbTool', () => {
  it('should hand the handler a live connection', async () => {
    const connection = new FakeConnection();
    const context = createTestContext(connection);

    const response = await executeDbTool(context, 'demo', async (conn) => {
      await conn.query('SELECT 1');
      return Success('done');
    });

    expect(response).toEqual({ content: [{ type: 'text', text: 'done' }] });
    expect(connection.sql).toEqual(['SELECT 1']);
    expect(context.database.isConnected).toBe(true);
  });

  it('should turn failures into error responses', async () => {
    const response = await executeDbTool(createTestContext(), 'demo', async () =>
      Failure('table_name is required'),
    );

    expect(response).toEqual(formatErrorResponse('table_name is required'));
  });

  it('should turn thrown errors into error responses', async () => {
    const response = await executeDbTool(createTestContext(), 'demo', async () => {
      throw new Error('[Error 3706] Syntax error');
    });

    expect(textOf(response)).toBe('Error: [Error 3706] Syntax error');
    expect(response.isError).toBe(true);
  });
});

describe('executeVectorStoreTool', () => {
  it('should fail without a configured store', async () => {
    const response = await executeVectorStoreTool(createTestContext(), 'demo', async () =>
      Success('unused'),
    );

    expect(textOf(response)).toBe(`Error: ${VECTOR_STORE_UNAVAILABLE}`);
  });

  it('should refresh once and retry after an expired session', async () => {
    const store = stubStore();
    const handler = jest
      .fn<() => Promise<Result<string>>>()
      .mockResolvedValueOnce(Failure('Vector store request failed with status 401: expired'))
      .mockResolvedValueOnce(Success('answer'));

    const response = await executeVectorStoreTool(
      createTestContext(undefined, { vectorStore: store }),
      'demo',
      handler,
    );

    expect(textOf(response)).toBe('answer');
    expect(store.refresh).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('should report a failed retry', async () => {
    const store = stubStore();
    const handler = jest.fn(async () => Failure<string>('Session expired'));

    const response = await executeVectorStoreTool(
      createTestContext(undefined, { vectorStore: store }),
      'demo',
      handler,
    );

    expect(textOf(response)).toBe('Error: After refresh, still failed: Session expired');
    expect(store.refresh).toHaveBeenCalledTimes(1);
  });

  it('should not retry other errors', async () => {
    const store = stubStore();

    const response = await executeVectorStoreTool(
      createTestContext(undefined, { vectorStore: store }),
      'demo',
      async () => Failure('status 500'),
    );

    expect(textOf(response)).toBe('Error: status 500');
    expect(store.refresh).not.toHaveBeenCalled();
  });
});
