// services/TelegramDeliveryService.ts
import axios, { AxiosInstance } from 'axios'
import { sleep } from '../utils/util'
import { ArchiveDelivery } from './types'

export interface TelegramConfig {
  botToken: string
  chatId: string
  timeoutMs: number
  maxRetries: number
  backoffBaseMs: number
}

const RETRYABLE_STATUS = new Set([429, 500, 502, 503])

export class TelegramDeliveryService implements ArchiveDelivery {
  private http: AxiosInstance

  constructor(
    private readonly config: TelegramConfig,
    http?: AxiosInstance,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    this.http = http ?? axios.create({ baseURL: 'https://api.telegram.org', timeout: config.timeoutMs })
  }

  isEnabled(): boolean {
    return Boolean(this.config.botToken && this.config.chatId)
  }

  /**
   * Uploads the archive as a document. Retries transport errors and
   * 429/5xx answers with exponential backoff; never throws.
   */
  async sendDocument(bytes: Buffer, filename: string): Promise<boolean> {
    if (!this.isEnabled()) {
      console.warn(`⚠️ Telegram not configured, ${filename} not sent`)
      return false
    }

    const url = `/bot${this.config.botToken}/sendDocument`
    const attempts = this.config.maxRetries + 1

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const form = new FormData()
      form.append('chat_id', this.config.chatId)
      form.append('document', new Blob([new Uint8Array(bytes)]), filename)

      try {
        await this.http.post(url, form)
        console.log(`✅ Sent ${filename} to Telegram`)
        return true
      } catch (error) {
        const status = axios.isAxiosError(error) ? error.response?.status : undefined
        const retryable = status === undefined || RETRYABLE_STATUS.has(status)
        const message = error instanceof Error ? error.message : String(error)

        if (!retryable || attempt === attempts) {
          console.error(`Telegram error for ${filename}: ${message}`)
          return false
        }
        console.warn(`  ⚠️ Telegram attempt ${attempt}/${attempts} failed (${status ?? 'network'}), retrying`)
        await this.wait(this.config.backoffBaseMs * 2 ** (attempt - 1))
      }
    }
    return false
  }
}
