/**
 * Connection Tools
 */

import { z } from 'zod';
import { errorMessage } from '../../lib/errors';
import { formatErrorResponse, formatTextResponse } from '../../mcp/tools/response-formatter';
import { defineTool } from '../../mcp/tools/tool-definition';

export const RECONNECTED = 'Reconnected to Teradata database successfully.';

export const reconnectTool = defineTool({
  name: 'reconnect_to_database',
  description: 'Reconnect to the Teradata database if the connection is lost.',
  category: 'connection',
  shape: z.object({}).shape,
  run: async (_params, context) => {
    try {
      await context.database.reconnect();
      return formatTextResponse(RECONNECTED);
    } catch (error) {
      context.logger.error({ error: errorMessage(error) }, 'Error reconnecting to database');
      return formatErrorResponse(errorMessage(error));
    }
  },
});

export const connectionTools = [reconnectTool];
