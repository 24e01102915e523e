import { z } from 'zod'
import { POLICY_TYPES, STAKEHOLDERS } from './types'

export const StakeholderSchema = z.enum(STAKEHOLDERS)

// closed attribute set: unknown keys are rejected
export const NodeAttributesSchema = z
  .object({
    label: z.string().optional(),
    region: z.string().optional(),
    sector: z.string().optional(),
    population: z.number().nonnegative().optional(),
    households: z.number().nonnegative().optional(),
    incomeLevel: z.number().optional()
  })
  .strict()

export const NodeSchema = z
  .object({
    id: z.string().min(1),
    type: StakeholderSchema,
    attributes: NodeAttributesSchema.default({})
  })
  .strict()

// weight range is left to validateGraph so the error names the edge
export const EdgeSchema = z
  .object({
    source: z.string().min(1),
    target: z.string().min(1),
    weight: z.number(),
    relation: z.string().min(1)
  })
  .strict()

export const GraphConfigSchema = z.object({
  nodes: z.array(NodeSchema),
  edges: z.array(EdgeSchema)
})

export const SERIALIZED_GRAPH_VERSION = 1

export const SerializedGraphSchema = GraphConfigSchema.extend({
  version: z.literal(SERIALIZED_GRAPH_VERSION)
})

export const BaselineIndicatorSchema = z.object({
  value: z.number(),
  unit: z.string(),
  source: z.string(),
  timestamp: z.string(),
  confidence: z.number().min(0).max(1)
})

export const BaselineDataSchema = z.object({
  indicators: z.record(BaselineIndicatorSchema),
  metadata: z.record(z.string()).default({})
})

export const PolicyVariablesSchema = z.object({
  policyType: z.enum(POLICY_TYPES),
  targetGroup: z.array(StakeholderSchema).min(1),
  parameters: z.record(z.number()),
  timeline: z
    .object({
      start: z.string().optional(),
      end: z.string().optional(),
      phases: z.number().int().positive().optional()
    })
    .optional()
})

export function formatIssues(error: z.ZodError) {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}
