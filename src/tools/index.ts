/**
 * Built-in tool registry
 */

import type { Tool, ToolCategory } from '../mcp/tools/tool-definition';
import { baseTools } from './base';
import { connectionTools } from './connection';
import { dbaTools } from './dba';
import { featureStoreTools } from './feature-store';
import { qltyTools } from './qlty';
import { ragTools } from './rag';
import { secTools } from './sec';
import { vectorStoreTools } from './vector-store';

export function getBuiltinTools(): Tool[] {
  return [
    ...baseTools,
    ...dbaTools,
    ...qltyTools,
    ...ragTools,
    ...secTools,
    ...vectorStoreTools,
    ...connectionTools,
    ...featureStoreTools,
  ];
}

export function toolsByCategory(tools: readonly Tool[], category: ToolCategory): Tool[] {
  return tools.filter((tool) => tool.category === category);
}
