import { z } from 'zod'
import { normalizeIdentifier, validateVatNumber } from '../../validators.js'
import { defineTool, errorOutcome, type RegisteredTool, type ToolContext, type ToolOutcome } from './types.js'

const VatInput = z.object({
  vatNumber: z.string().min(1),
})

const CreateContactInput = z.object({
  name: z.string().min(1),
  vatNumber: z.string().nullish(),
  address: z.string().nullish(),
})

const vatNumberSchema = {
  type: 'object' as const,
  properties: {
    vatNumber: { type: 'string', description: 'Counterparty VAT number, e.g. BE0123456789' },
  },
  required: ['vatNumber'],
}

export function contactTools(ctx: ToolContext): RegisteredTool[] {
  const tools: RegisteredTool[] = []
  const { lookupContact, createContact, lookupLegalEntity } = ctx.collaborators
  const tenantId = ctx.request.tenantId

  if (lookupContact) {
    tools.push(defineTool({
      name: 'lookup_contact',
      description: 'Find an existing contact of this tenant by VAT number. matchType "EXACT" means the stored VAT number equals the one given.',
      inputSchema: vatNumberSchema,
      input: VatInput,
      async execute({ vatNumber }): Promise<ToolOutcome> {
        const vatValid = validateVatNumber(vatNumber).valid
        const contact = await lookupContact(tenantId, normalizeIdentifier(vatNumber))
        if (!contact) {
          return { output: { found: false, vatValid }, notes: 'not_found' }
        }

        const exact = contact.vatNumber != null &&
          normalizeIdentifier(contact.vatNumber) === normalizeIdentifier(vatNumber)
        const matchType = exact ? 'EXACT' : 'PARTIAL'
        return {
          output: {
            found: true,
            contactId: contact.id,
            name: contact.name,
            vatNumber: contact.vatNumber ?? null,
            matchType,
            vatValid,
          },
          notes: matchType,
        }
      },
    }))
  }

  if (createContact) {
    tools.push(defineTool({
      name: 'create_contact',
      description: 'Create a new contact for the counterparty when lookup_contact found none.',
      inputSchema: {
        type: 'object',
        properties: {
          name: { type: 'string', description: 'Legal name of the counterparty' },
          vatNumber: { type: 'string', description: 'VAT number, if known' },
          address: { type: 'string', description: 'Postal address, if known' },
        },
        required: ['name'],
      },
      input: CreateContactInput,
      async execute({ name, vatNumber, address }) {
        if (vatNumber && !validateVatNumber(vatNumber).valid) {
          return errorOutcome(`Refusing to create contact with invalid VAT number ${vatNumber}`)
        }
        const result = await createContact(
          tenantId,
          name,
          vatNumber ? normalizeIdentifier(vatNumber) : null,
          address ?? null
        )
        return {
          output: {
            success: result.success,
            contactId: result.contactId ?? null,
            error: result.error ?? null,
          },
          notes: result.success ? 'created' : result.error ?? 'create_failed',
        }
      },
    }))
  }

  if (lookupLegalEntity) {
    tools.push(defineTool({
      name: 'lookup_legal_entity',
      description: 'Look up a company in the legal-entity registry by VAT number to confirm its name and address.',
      inputSchema: vatNumberSchema,
      input: VatInput,
      async execute({ vatNumber }): Promise<ToolOutcome> {
        const entity = await lookupLegalEntity(normalizeIdentifier(vatNumber))
        if (!entity) {
          return { output: { found: false }, notes: 'not_found' }
        }
        return {
          output: {
            found: true,
            vatNumber: entity.vatNumber,
            name: entity.name,
            address: entity.address ?? null,
            active: entity.active ?? null,
          },
        }
      },
    }))
  }

  return tools
}
