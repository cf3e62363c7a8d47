// services/angel-service/types.ts

export type Exchange = 'NSE' | 'NFO'
export type CandleInterval = 'ONE_DAY' | 'ONE_MINUTE'

export interface CandleDataRequest {
  exchange: Exchange
  symboltoken: string
  interval: CandleInterval
  fromdate: string // yyyy-MM-dd HH:mm
  todate: string
}

export interface CandleDataResponse {
  status: boolean
  message: string
  errorcode: string
  data: unknown // [timestamp, open, high, low, close, volume][] on success
}

export interface SessionTokens {
  jwtToken: string
  refreshToken: string
  feedToken: string
}

export interface LoginResponse {
  status: boolean
  message: string
  errorcode: string
  data: Partial<SessionTokens> | null
}

export interface AngelConfig {
  apiKey: string
  clientCode: string
  pin: string
  totpSecret: string
  baseUrl: string
  timeoutMs: number
}

export interface CandleDataSource {
  getCandleData(params: CandleDataRequest): Promise<CandleDataResponse>
}
