// services/angel-service/AngelService.ts
import axios, { AxiosInstance } from 'axios'
import { authenticator } from 'otplib'
import { FatalStartupError, describeError } from '../../utils/errors'
import { AngelConfig, LoginResponse, SessionTokens } from './types'

const LOGIN_PATH = '/rest/auth/angelbroking/user/v1/loginByPassword'

/**
 * Holds the SmartAPI session. One instance per run; the JWT is attached to
 * every secure request made through `post`.
 */
export class AngelService {
  private http: AxiosInstance
  private session: SessionTokens | null = null

  constructor(private readonly config: AngelConfig, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
      })
    console.log(`Angel service initialised: ${config.baseUrl} (client ${config.clientCode})`)
  }

  private baseHeaders(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'X-UserType': 'USER',
      'X-SourceID': 'WEB',
      'X-ClientLocalIP': '127.0.0.1',
      'X-ClientPublicIP': '127.0.0.1',
      'X-MACAddress': '00:00:00:00:00:00',
      'X-PrivateKey': this.config.apiKey,
    }
  }

  generateTotp(): string {
    return this.config.totpSecret ? authenticator.generate(this.config.totpSecret) : ''
  }

  async login(): Promise<SessionTokens> {
    let body: LoginResponse
    try {
      const response = await this.http.post<LoginResponse>(
        LOGIN_PATH,
        {
          clientcode: this.config.clientCode,
          password: this.config.pin,
          totp: this.generateTotp(),
        },
        { headers: this.baseHeaders() }
      )
      body = response.data
    } catch (error) {
      throw new FatalStartupError(`Login failed: ${describeError(error)}`, { cause: error })
    }

    const tokens = body?.data
    if (!body?.status || !tokens?.jwtToken) {
      throw new FatalStartupError(`Login failed: ${body?.message || 'no session returned'}`)
    }

    this.session = {
      jwtToken: tokens.jwtToken,
      refreshToken: tokens.refreshToken ?? '',
      feedToken: tokens.feedToken ?? '',
    }
    console.log('✅ Login successful')
    return this.session
  }

  isLoggedIn(): boolean {
    return this.session !== null
  }

  async post<T>(path: string, payload: object): Promise<T> {
    if (!this.session) {
      throw new Error('Angel session not established')
    }
    const response = await this.http.post<T>(path, payload, {
      headers: {
        ...this.baseHeaders(),
        Authorization: `Bearer ${this.session.jwtToken}`,
      },
    })
    return response.data
  }
}
