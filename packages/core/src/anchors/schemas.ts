/**
 * Zod schemas and types for semantic anchors and their components.
 */

import { z } from 'zod'
import { UUIDSchema, TimestampSchema, NonEmptyStringSchema } from '../common/index.js'
import { ComponentTypeSchema } from '../vectors/store.js'

export const AnchorComponentSchema = z.object({
  id: UUIDSchema,
  anchorId: UUIDSchema,
  type: ComponentTypeSchema,
  componentId: z.string().min(1),
  createdAt: TimestampSchema,
})

export type AnchorComponent = z.infer<typeof AnchorComponentSchema>

export const AnchorSchema = z.object({
  id: UUIDSchema,
  name: z.string().min(1),
  description: z.string(),
  author: z.string(),
  isActive: z.boolean(),
  components: z.array(AnchorComponentSchema),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
})

export type Anchor = z.infer<typeof AnchorSchema>

export const ComponentInputSchema = z.object({
  type: ComponentTypeSchema,
  componentId: NonEmptyStringSchema,
})

export type ComponentInput = z.infer<typeof ComponentInputSchema>

export const CreateAnchorInputSchema = z.object({
  name: NonEmptyStringSchema,
  description: z.string().default(''),
  author: z.string().default(''),
  isActive: z.boolean().default(true),
  components: z.array(ComponentInputSchema).default([]),
})

export type CreateAnchorInput = z.input<typeof CreateAnchorInputSchema>
