export type { Activity } from './types.js'
export { ActivityRoster } from './roster.js'
export { loadActivities, parseActivities, DEFAULT_SEED_FILE } from './seed.js'
