import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { DEFAULT_HORIZON_DAYS } from './calendar/recurrence.js'
import { DEFAULT_SEED_FILE } from './activities/seed.js'

const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_HOST = '127.0.0.1'
const DEFAULT_PORT = 8000
const DEFAULT_LOG_LEVEL = 'info'
const DEFAULT_CALENDAR_NAME = 'School Activities'

export interface HubConfig {
  server: {
    host: string
    port: number
  }
  logging: {
    level: string
    /** Pretty-print through pino-pretty instead of JSON lines */
    pretty: boolean
  }
  calendar: {
    recurrenceHorizonDays: number
    name: string
  }
  roster: {
    seedFile: string
  }
}

interface YamlConfig {
  server?: {
    host?: string
    port?: number
  }
  logging?: {
    level?: string
    pretty?: boolean
  }
  calendar?: {
    recurrenceHorizonDays?: number
    name?: string
  }
  roster?: {
    seedFile?: string
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {}
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function bool(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Keep only the keys we know, with the types we expect
 */
function toYamlConfig(raw: unknown): YamlConfig {
  const root = section(raw)
  const server = section(root.server)
  const logging = section(root.logging)
  const calendar = section(root.calendar)
  const roster = section(root.roster)

  return {
    server: { host: str(server.host), port: num(server.port) },
    logging: { level: str(logging.level), pretty: bool(logging.pretty) },
    calendar: {
      recurrenceHorizonDays: num(calendar.recurrenceHorizonDays),
      name: str(calendar.name),
    },
    roster: { seedFile: str(roster.seedFile) },
  }
}

/**
 * Directory holding config.yaml: ACTIVITY_HUB_DIR, else the working directory
 */
export function findConfigDir(): string {
  return path.resolve(process.env.ACTIVITY_HUB_DIR ?? process.cwd())
}

function loadYamlConfig(configDir: string): YamlConfig {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    return toYamlConfig(parse(readFileSync(configPath, 'utf-8')))
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

function envPort(): number | undefined {
  const raw = process.env.PORT
  if (!raw) return undefined
  const port = parseInt(raw, 10)
  return Number.isNaN(port) ? undefined : port
}

/**
 * Load configuration from config.yaml, with PORT and HOST from the
 * environment taking precedence. Relative paths resolve against configDir.
 */
export function loadConfig(configDir: string = findConfigDir()): HubConfig {
  const yaml = loadYamlConfig(configDir)
  const seedFile = yaml.roster?.seedFile

  return {
    server: {
      host: process.env.HOST ?? yaml.server?.host ?? DEFAULT_HOST,
      port: envPort() ?? yaml.server?.port ?? DEFAULT_PORT,
    },
    logging: {
      level: yaml.logging?.level ?? DEFAULT_LOG_LEVEL,
      pretty: yaml.logging?.pretty ?? true,
    },
    calendar: {
      recurrenceHorizonDays: yaml.calendar?.recurrenceHorizonDays ?? DEFAULT_HORIZON_DAYS,
      name: yaml.calendar?.name ?? DEFAULT_CALENDAR_NAME,
    },
    roster: {
      seedFile: seedFile ? path.resolve(configDir, seedFile) : DEFAULT_SEED_FILE,
    },
  }
}
