import { describe, it, expect } from 'vitest'
import { ConfigError, loadOrchestratorConfig, maxIterationsFor } from '../config.js'

describe('loadOrchestratorConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadOrchestratorConfig({})).toEqual({
      autonomyMode: 'autonomous',
      linkPolicy: 'VAT_ONLY',
      orchestratorModel: 'claude-sonnet-4-20250514',
      visionModel: 'gpt-4o',
      repairMaxChars: 12000,
    })
  })

  it('reads and coerces explicit values', () => {
    const config = loadOrchestratorConfig({
      AUTONOMY_MODE: 'sovereign',
      CONTACT_LINK_POLICY: 'VAT_OR_STRONG_SIGNALS',
      ORCHESTRATOR_MODEL: 'test-model',
      REPAIR_MAX_CHARS: '5000',
    })
    expect(config.autonomyMode).toBe('sovereign')
    expect(config.linkPolicy).toBe('VAT_OR_STRONG_SIGNALS')
    expect(config.orchestratorModel).toBe('test-model')
    expect(config.repairMaxChars).toBe(5000)
  })

  it('treats empty strings as unset', () => {
    expect(loadOrchestratorConfig({ AUTONOMY_MODE: '  ' }).autonomyMode).toBe('autonomous')
  })

  it('rejects unknown autonomy modes', () => {
    expect(() => loadOrchestratorConfig({ AUTONOMY_MODE: 'reckless' })).toThrow(ConfigError)
    expect(() => loadOrchestratorConfig({ AUTONOMY_MODE: 'reckless' }))
      .toThrow(/^Invalid orchestrator configuration: AUTONOMY_MODE: /)
  })

  it('rejects a non-positive repair limit', () => {
    expect(() => loadOrchestratorConfig({ REPAIR_MAX_CHARS: '-5' })).toThrow(ConfigError)
  })
})

describe('maxIterationsFor', () => {
  it('raises the ceiling with each autonomy tier', () => {
    expect(maxIterationsFor('assisted')).toBe(8)
    expect(maxIterationsFor('autonomous')).toBe(12)
    expect(maxIterationsFor('sovereign')).toBe(32)
  })
})
