import type { EngineSettings } from './engine/types.js'

export interface ServerConfig {
  port: number
  host: string
  nodeEnv: string
  logLevel: string
  corsOrigin: boolean | string[]
  engine: EngineSettings
  maxGames: number
  gameIdleTtlMs: number
  sweepIntervalMs: number
}

type Env = Record<string, string | undefined>

// Largest delay setInterval accepts before falling back to 1 ms
const MAX_TIMER_MS = 2147483647
const MAX_PORT = 65535

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`)
  }
  if (value > max) {
    throw new Error(`${name} must be an integer <= ${max}, got "${raw}"`)
  }
  return value
}

function readCorsOrigin(raw: string | undefined): boolean | string[] {
  if (raw === undefined || raw.trim() === '' || raw === 'true' || raw === '*') {
    return true // reflect any origin
  }
  if (raw === 'false') {
    return false
  }
  return raw.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const nodeEnv = env.NODE_ENV || 'development'
  const isDev = nodeEnv === 'development'

  return {
    port: readInt(env, 'PORT', isDev ? 8890 : 9001, 0, MAX_PORT),
    host: env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: env.LOG_LEVEL || (isDev ? 'info' : 'warn'),
    corsOrigin: readCorsOrigin(env.CORS_ORIGIN),
    engine: {
      rows: readInt(env, 'BOARD_ROWS', 6, 1),
      columns: readInt(env, 'BOARD_COLUMNS', 7, 1),
      connect: readInt(env, 'CONNECT_LENGTH', 4, 2),
    },
    maxGames: readInt(env, 'MAX_GAMES', 1000, 1),
    gameIdleTtlMs: readInt(env, 'GAME_IDLE_TTL_MS', 60 * 60 * 1000, 1, MAX_TIMER_MS),
    sweepIntervalMs: readInt(env, 'SWEEP_INTERVAL_MS', 60 * 1000, 1, MAX_TIMER_MS),
  }
}
