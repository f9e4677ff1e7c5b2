export class AgentIterationLimitError extends Error {
  constructor(readonly maxIterations: number) {
    super(`Agent exceeded maximum of ${maxIterations} iterations without a final answer`)
    this.name = 'AgentIterationLimitError'
  }
}

export class AgentSessionClosedError extends Error {
  constructor(sessionId: string) {
    super(`Agent session ${sessionId} is closed`)
    this.name = 'AgentSessionClosedError'
  }
}

export class DocumentTooLargeError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DocumentTooLargeError'
  }
}

export class UnsupportedDocumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedDocumentError'
  }
}

// Maximum document size handed to vision tools: 25MB
export const MAX_DOCUMENT_SIZE = 25 * 1024 * 1024
