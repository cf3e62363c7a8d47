// services/SymbolMasterService.ts
import axios, { AxiosInstance } from 'axios'
import JSZip from 'jszip'
import { parse } from 'csv-parse/sync'
import { parseListedExpiry } from '../utils/util'
import { ContractRow, SymbolMasterSource } from './types'

export const DEFAULT_SYMBOL_MASTER_URL = 'https://api.shoonya.com/NFO_symbols.txt.zip'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const field = (record: Record<string, unknown>, key: string): string => {
  const value = record[key]
  return typeof value === 'string' ? value : ''
}

const parseStrike = (value: string): number | null => {
  if (value.trim() === '') return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

/**
 * Parses the NFO symbol master CSV. Lines carry a trailing comma that would
 * otherwise add an unnamed column.
 */
export function parseSymbolMaster(text: string): ContractRow[] {
  const content = text
    .split(/\r?\n/)
    .map((line) => line.replace(/,+$/, ''))
    .join('\n')

  const records: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  })

  if (!Array.isArray(records)) return []

  return records.filter(isRecord).map((record) => {
    const expiry = field(record, 'Expiry')
    return {
      symbol: field(record, 'Symbol'),
      instrument: field(record, 'Instrument'),
      expiry,
      expiryDate: expiry ? parseListedExpiry(expiry) : null,
      strikePrice: parseStrike(field(record, 'StrikePrice')),
      tradingSymbol: field(record, 'TradingSymbol'),
      token: field(record, 'Token'),
    }
  })
}

export class SymbolMasterService implements SymbolMasterSource {
  private http: AxiosInstance

  constructor(private readonly url: string = DEFAULT_SYMBOL_MASTER_URL, http?: AxiosInstance) {
    this.http = http ?? axios.create({ timeout: 60_000 })
  }

  async load(): Promise<ContractRow[]> {
    console.log(`Downloading symbol master: ${this.url}`)
    const response = await this.http.get<ArrayBuffer>(this.url, { responseType: 'arraybuffer' })

    const zip = await JSZip.loadAsync(response.data)
    const [firstName] = Object.keys(zip.files).filter((name) => !zip.files[name].dir)
    if (!firstName) {
      throw new Error('Symbol master archive is empty')
    }

    const rows = parseSymbolMaster(await zip.files[firstName].async('string'))
    console.log(`✅ Symbol master loaded: ${rows.length} rows`)
    return rows
  }
}
