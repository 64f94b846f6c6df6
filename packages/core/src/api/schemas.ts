/**
 * Zod Schemas for the fields the facades read
 * @module api/schemas
 *
 * Only the fields a facade depends on are described; everything else in a
 * document passes through untouched.
 */

import { z } from 'zod'

// ============================================================================
// Authentication
// ============================================================================

/**
 * Token carried in the body of an auth response, for servers that do not
 * send the authToken header
 */
export const AuthBodySchema = z.object({
  authToken: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
})

// ============================================================================
// Profiles
// ============================================================================

const UidSchema = z.string().min(1)

/**
 * Profile creation answer: `{ profile: { uid } }` or a bare `{ uid }`
 */
export const ProfileCreatedSchema = z.union([
  z.object({ profile: z.object({ uid: UidSchema }) }),
  z.object({ uid: UidSchema }),
])

/**
 * Profile listing answer
 */
export const ProfileListSchema = z.object({
  profiles: z.array(z.object({ uid: UidSchema })).default([]),
})

// ============================================================================
// Profile Items
// ============================================================================

/**
 * Item creation answer when the server did not send a Location header
 */
export const ItemCreatedSchema = z.union([
  z.object({ profileItem: z.object({ uid: UidSchema }) }),
  z.object({ uid: UidSchema }),
])

/**
 * Amount as AMEE reports it on a profile item
 */
export const AmountSchema = z.union([
  z.number(),
  z.object({
    value: z.number(),
    unit: z.string(),
  }),
])

/**
 * Item document: amount at the top level or under `profileItem`
 */
export const ItemAmountSchema = z.union([
  z.object({ amount: AmountSchema }),
  z.object({ profileItem: z.object({ amount: AmountSchema }) }),
])

// ============================================================================
// Drill-down
// ============================================================================

/**
 * Drill answer. Each choice has a name and a value, which AMEE keeps equal.
 */
export const DrillResponseSchema = z.object({
  choices: z.object({
    name: z.string(),
    choices: z.array(
      z.object({
        name: z.string(),
        value: z.string().optional(),
      })
    ),
  }),
})

// ============================================================================
// Type Inference
// ============================================================================

export type Amount = z.infer<typeof AmountSchema>

export type ValidatedDrillResponse = z.infer<typeof DrillResponseSchema>
