/**
 * Activity Seed Loader
 *
 * Reads the starting catalogue from a JSON file. The bundled file lives in
 * packages/core/data/activities.json.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { Activity } from './types.js'

export const DEFAULT_SEED_FILE = fileURLToPath(
  new URL('../../data/activities.json', import.meta.url),
)

const activitySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  schedule: z.string(),
  maxParticipants: z.number().int().positive(),
  participants: z.array(z.string()),
})

const seedSchema = z.array(activitySchema)

export function parseActivities(raw: string): Activity[] {
  return seedSchema.parse(JSON.parse(raw))
}

export function loadActivities(seedFile: string = DEFAULT_SEED_FILE): Activity[] {
  return parseActivities(readFileSync(seedFile, 'utf-8'))
}
