export {
  TeradataMCPServer,
  type ServerDependencies,
  type CreateServerOptions,
} from './mcp-server';
export {
  startStreamableHttpServer,
  startSseServer,
  type RunningServer,
  type McpServerFactory,
} from './http';
export { startRestServer, handleRestToolCall, buildOpenApiDocument, isAuthorized } from './rest';
export { createShutdownHandler, installSignalHandlers } from './shutdown';
