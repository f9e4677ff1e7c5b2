export { createDocumentOrchestrator, summarizeResult } from './lib/agents/orchestrator.js'
export type { DocumentOrchestrator, OrchestratorDeps } from './lib/agents/orchestrator.js'
export { loadOrchestratorConfig, maxIterationsFor, ConfigError } from './lib/config.js'
export type { OrchestratorConfig } from './lib/config.js'
export { createAnthropicSession } from './lib/agents/agent-session.js'
export type { AgentSession, AgentSessionFactory, AgentSessionOptions } from './lib/agents/agent-session.js'
export { createOpenAIVisionClient } from './lib/agents/vision.js'
export type { VisionClient } from './lib/agents/vision.js'
export { allowsAutoLink, decideContactLink } from './lib/agents/contact-link-policy.js'
export {
  AgentIterationLimitError,
  AgentSessionClosedError,
  DocumentTooLargeError,
  UnsupportedDocumentError,
} from './lib/agents/errors.js'
export type * from './lib/agents/tools/types.js'
export type * from './types.js'
export { DOCUMENT_TYPES, CONTACT_LINK_POLICIES, AUTONOMY_MODES } from './types.js'
