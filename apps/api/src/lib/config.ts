import { z } from 'zod'
import { AUTONOMY_MODES, CONTACT_LINK_POLICIES, type AutonomyMode, type ContactLinkPolicy } from '../types.js'

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

const EnvSchema = z.object({
  AUTONOMY_MODE: z.enum(AUTONOMY_MODES).default('autonomous'),
  CONTACT_LINK_POLICY: z.enum(CONTACT_LINK_POLICIES).default('VAT_ONLY'),
  ORCHESTRATOR_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  VISION_MODEL: z.string().min(1).default('gpt-4o'),
  REPAIR_MAX_CHARS: z.coerce.number().int().positive().default(12000),
})

export interface OrchestratorConfig {
  autonomyMode: AutonomyMode
  linkPolicy: ContactLinkPolicy
  orchestratorModel: string
  visionModel: string
  repairMaxChars: number
}

// Tool-call iteration ceiling per autonomy tier
export const MAX_AGENT_ITERATIONS: Record<AutonomyMode, number> = {
  assisted: 8,
  autonomous: 12,
  sovereign: 32,
}

export function maxIterationsFor(mode: AutonomyMode): number {
  return MAX_AGENT_ITERATIONS[mode]
}

export function loadOrchestratorConfig(
  env: Record<string, string | undefined> = process.env
): OrchestratorConfig {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid orchestrator configuration: ${details}`)
  }

  return {
    autonomyMode: parsed.data.AUTONOMY_MODE,
    linkPolicy: parsed.data.CONTACT_LINK_POLICY,
    orchestratorModel: parsed.data.ORCHESTRATOR_MODEL,
    visionModel: parsed.data.VISION_MODEL,
    repairMaxChars: parsed.data.REPAIR_MAX_CHARS,
  }
}
