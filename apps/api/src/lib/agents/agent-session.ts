/**
 * Agent session - one bounded tool-calling conversation with the orchestrator model.
 *
 * Loop:
 *   model turn → tool_use blocks? → execute sequentially → tool_result blocks → next turn
 *   model turn without tool_use → final text answer
 *
 * The harness owns the iteration ceiling and the session lifetime: `close()`
 * aborts any in-flight request and makes further `run()` calls fail.
 */

import Anthropic from '@anthropic-ai/sdk'
import { AgentIterationLimitError, AgentSessionClosedError } from './errors.js'

export type ToolInvoker = (name: string, input: unknown) => Promise<string>

export interface AgentSessionOptions {
  id: string
  model: string
  systemPrompt: string
  tools: Anthropic.Tool[]
  maxIterations: number
  invokeTool: ToolInvoker
  maxTokens?: number
}

export interface AgentSession {
  run(userPrompt: string): Promise<string>
  close(): void
}

export type AgentSessionFactory = (options: AgentSessionOptions) => AgentSession

let anthropic: Anthropic | null = null

function getAnthropic(): Anthropic {
  if (!anthropic) {
    anthropic = new Anthropic()
  }
  return anthropic
}

function textOf(content: Anthropic.ContentBlock[]): string {
  return content
    .filter((block): block is Anthropic.TextBlock => block.type === 'text')
    .map(block => block.text)
    .join('\n')
    .trim()
}

export const createAnthropicSession: AgentSessionFactory = (options) => {
  const controller = new AbortController()
  let closed = false

  async function run(userPrompt: string): Promise<string> {
    if (closed) {
      throw new AgentSessionClosedError(options.id)
    }

    const client = getAnthropic()
    const messages: Anthropic.MessageParam[] = [{ role: 'user', content: userPrompt }]
    let iterations = 0

    while (iterations < options.maxIterations) {
      iterations++

      const response = await client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens ?? 8192,
          system: options.systemPrompt,
          ...(options.tools.length > 0 ? { tools: options.tools } : {}),
          messages,
        },
        { signal: controller.signal }
      )

      const toolUseBlocks = response.content.filter(
        (b): b is Anthropic.ToolUseBlock => b.type === 'tool_use'
      )

      // No tool calls: this is the final answer
      if (toolUseBlocks.length === 0) {
        console.log(`[AGENT] ${options.id} finished after ${iterations} iteration(s)`)
        return textOf(response.content)
      }

      const toolResults: Anthropic.ToolResultBlockParam[] = []
      for (const block of toolUseBlocks) {
        if (closed) {
          throw new AgentSessionClosedError(options.id)
        }
        const content = await options.invokeTool(block.name, block.input)
        toolResults.push({
          type: 'tool_result',
          tool_use_id: block.id,
          content,
        })
      }

      messages.push({ role: 'assistant', content: response.content })
      messages.push({ role: 'user', content: toolResults })
    }

    console.warn(`[AGENT] ${options.id} hit the iteration ceiling (${options.maxIterations})`)
    throw new AgentIterationLimitError(options.maxIterations)
  }

  function close(): void {
    if (closed) return
    closed = true
    controller.abort()
  }

  return { run, close }
}
