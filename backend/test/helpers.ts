// test/helpers.ts
import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import { DateTime } from 'luxon'
import { CandleDataRequest, CandleDataResponse, CandleDataSource } from '../services/angel-service'
import { ContractRow, IndexProfile } from '../services/types'

export const fixedClock = (iso: string) => () => DateTime.fromISO(iso, { zone: 'Asia/Kolkata' })

export const BANKNIFTY: IndexProfile = {
  name: 'BANKNIFTY',
  token: '99926009',
  strikeStep: 100,
  roundTo: 100,
  buffer: 1000,
}

export function okResponse(data: unknown): CandleDataResponse {
  return { status: true, message: 'SUCCESS', errorcode: '', data }
}

export function notOkResponse(message = 'Something Went Wrong'): CandleDataResponse {
  return { status: false, message, errorcode: 'AB1004', data: null }
}

type Responder = (params: CandleDataRequest, call: number) => CandleDataResponse | Promise<CandleDataResponse>

export class FakeCandleSource implements CandleDataSource {
  calls: CandleDataRequest[] = []

  constructor(private readonly respond: Responder) {}

  async getCandleData(params: CandleDataRequest): Promise<CandleDataResponse> {
    this.calls.push(params)
    return this.respond(params, this.calls.length)
  }
}

export function contract(overrides: Partial<ContractRow> = {}): ContractRow {
  return {
    symbol: 'BANKNIFTY',
    instrument: 'OPTIDX',
    expiry: '29-JAN-2025',
    expiryDate: '2025-01-29',
    strikePrice: 50000,
    tradingSymbol: 'BANKNIFTY29JAN25C50000',
    token: '43564',
    ...overrides,
  }
}

export function minuteRow(time: string, close: number): [string, number, number, number, number, number] {
  return [`2025-01-29T${time}:00+05:30`, close - 1, close + 2, close - 3, close, 1500]
}

// Deterministic pseudo-random sequence for property-style loops
export function seededRandom(seed: number): () => number {
  let state = seed % 2147483647 || 1
  return () => {
    state = (state * 16807) % 2147483647
    return (state - 1) / 2147483646
  }
}

type HttpReply = { status: number; data: unknown }

/**
 * Axios instance answered in-process. The responder may throw to simulate a
 * network failure; status >= 400 rejects the way axios does.
 */
export function stubAxios(responder: (config: InternalAxiosRequestConfig, call: number) => HttpReply): {
  http: AxiosInstance
  calls: InternalAxiosRequestConfig[]
} {
  const calls: InternalAxiosRequestConfig[] = []
  const http = axios.create({
    adapter: async (config) => {
      calls.push(config)
      const reply = responder(config, calls.length)
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      }
      if (reply.status >= 400) {
        throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response)
      }
      return response
    },
  })
  return { http, calls }
}
