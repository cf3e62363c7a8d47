// backend/config/settings.ts
import { DEFAULT_SYMBOL_MASTER_URL } from '../services/SymbolMasterService'
import { FatalStartupError } from '../utils/errors'

const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback
  return ['1', 'true', 'yes', 'y', 'on'].includes(value.trim().toLowerCase())
}

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const parseCsv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback
  return value
    .split(',')
    .map((v) => v.trim().toUpperCase())
    .filter(Boolean)
}

export interface AngelSettings {
  apiKey: string
  clientCode: string
  pin: string
  totpSecret: string
  baseUrl: string
  timeoutMs: number
}

export interface TelegramSettings {
  botToken: string
  chatId: string
  timeoutMs: number
  maxRetries: number
  backoffBaseMs: number
}

export interface FetchSettings {
  maxWorkers: number
  minTimeMs: number
  maxAttempts: number
  backoffUnitMs: number
  lookbackWeeks: number
  historyDays: number
}

export interface Settings {
  angel: AngelSettings
  telegram: TelegramSettings
  fetch: FetchSettings
  symbolMasterUrl: string
  indices: string[]
  outputDir: string | null
  cron: string
  port: number
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const saveLocal = parseBool(env.SNAPSHOT_SAVE_LOCAL, true)

  return {
    angel: {
      apiKey: env.ANGEL_API_KEY ?? '',
      clientCode: env.ANGEL_CLIENT_ID ?? '',
      pin: env.ANGEL_PIN ?? '',
      totpSecret: env.ANGEL_TOTP ?? '',
      baseUrl: env.ANGEL_BASE_URL ?? 'https://apiconnect.angelone.in',
      timeoutMs: parseNumber(env.ANGEL_TIMEOUT_MS, 30_000),
    },
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN ?? '',
      chatId: env.TELEGRAM_CHAT_ID ?? env.TELEGRAM_CHAT_ID_NIFTY ?? '',
      timeoutMs: parseNumber(env.TELEGRAM_TIMEOUT_MS, 600_000),
      maxRetries: parseNumber(env.TELEGRAM_MAX_RETRIES, 5),
      backoffBaseMs: parseNumber(env.TELEGRAM_BACKOFF_BASE_MS, 2_000),
    },
    fetch: {
      maxWorkers: Math.max(1, parseNumber(env.SNAPSHOT_MAX_WORKERS, 3)),
      minTimeMs: parseNumber(env.SNAPSHOT_MIN_TIME_MS, 0),
      maxAttempts: Math.max(1, parseNumber(env.SNAPSHOT_MAX_ATTEMPTS, 3)),
      backoffUnitMs: parseNumber(env.SNAPSHOT_BACKOFF_UNIT_MS, 5_000),
      lookbackWeeks: parseNumber(env.SNAPSHOT_LOOKBACK_WEEKS, 6),
      historyDays: parseNumber(env.SNAPSHOT_HISTORY_DAYS, 90),
    },
    symbolMasterUrl: env.SYMBOL_MASTER_URL ?? DEFAULT_SYMBOL_MASTER_URL,
    indices: parseCsv(env.SNAPSHOT_INDICES, ['BANKNIFTY', 'FINNIFTY', 'MIDCPNIFTY']),
    outputDir: saveLocal ? env.SNAPSHOT_OUTPUT_DIR || '.' : null,
    cron: env.SNAPSHOT_CRON ?? '40 15 * * 1-5',
    port: parseNumber(env.PORT, 3001),
  }
}

/**
 * API key, client id and PIN are required; the TOTP secret only warns so a
 * session can still be attempted while debugging.
 */
export function validateCredentials(settings: Settings): void {
  const { apiKey, clientCode, pin, totpSecret } = settings.angel
  const missing = [
    ['ANGEL_API_KEY', apiKey],
    ['ANGEL_CLIENT_ID', clientCode],
    ['ANGEL_PIN', pin],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name)

  if (missing.length > 0) {
    throw new FatalStartupError(`❌ Missing critical Angel One credentials: ${missing.join(', ')}`)
  }

  if (!totpSecret) {
    console.warn('⚠️ ANGEL_TOTP is missing - login may fail')
  }
}
