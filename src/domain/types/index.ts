export { Success, Failure, isOk, isFail, failureFrom, type Result } from './result';
export {
  RAG_DEFAULTS,
  createSessionState,
  type RagConfig,
  type FeatureStoreConfig,
  type SessionState,
} from './session';
export type { TextContent, ToolResponse } from './tool-response';
