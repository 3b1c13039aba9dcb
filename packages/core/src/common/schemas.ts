/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const UUIDSchema = z.string().uuid()

export const TimestampSchema = z.string().datetime()

export const NonEmptyStringSchema = z.string().trim().min(1, 'Value cannot be empty')
