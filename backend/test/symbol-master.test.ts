import { describe, it, expect } from 'vitest'
import JSZip from 'jszip'
import { SymbolMasterService, parseSymbolMaster } from '../services/SymbolMasterService'
import { stubAxios } from './helpers'

const MASTER_CSV = [
  'Exchange,Token,LotSize,Symbol,TradingSymbol,Expiry,Instrument,OptionType,StrikePrice,TickSize,',
  'NFO,43564,15,BANKNIFTY,BANKNIFTY29JAN25C50000,29-JAN-2025,OPTIDX,CE,50000,0.05,',
  'NFO,43565,15,BANKNIFTY,BANKNIFTY29JAN25P50000,29-JAN-2025,OPTIDX,PE,50000.00,0.05,',
  'NFO,35012,15,BANKNIFTY,BANKNIFTY29JAN25F,29-JAN-2025,FUTIDX,XX,,0.05,',
  'NFO,40001,25,FINNIFTY,FINNIFTY28JAN25C23000,28-JAN-2025,OPTIDX,CE,n/a,0.05,',
  '',
].join('\r\n')

async function zipped(files: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip()
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content)
  }
  return zip.generateAsync({ type: 'nodebuffer' })
}

describe('parseSymbolMaster', () => {
  it('maps every row and ignores the trailing comma', () => {
    const rows = parseSymbolMaster(MASTER_CSV)

    expect(rows).toHaveLength(4)
    expect(rows[0]).toEqual({
      symbol: 'BANKNIFTY',
      instrument: 'OPTIDX',
      expiry: '29-JAN-2025',
      expiryDate: '2025-01-29',
      strikePrice: 50000,
      tradingSymbol: 'BANKNIFTY29JAN25C50000',
      token: '43564',
    })
    expect(rows[1].strikePrice).toBe(50000)
  })

  it('leaves the strike empty when it is blank or not numeric', () => {
    const rows = parseSymbolMaster(MASTER_CSV)

    expect(rows[2]).toMatchObject({ instrument: 'FUTIDX', strikePrice: null })
    expect(rows[3]).toMatchObject({ symbol: 'FINNIFTY', expiryDate: '2025-01-28', strikePrice: null })
  })

  it('keeps a row whose expiry cannot be read, with no expiry date', () => {
    const rows = parseSymbolMaster(
      'Exchange,Token,Symbol,TradingSymbol,Expiry,Instrument,StrikePrice,\nNFO,1,BANKNIFTY,X,someday,OPTIDX,100,\n'
    )

    expect(rows).toHaveLength(1)
    expect(rows[0].expiry).toBe('someday')
    expect(rows[0].expiryDate).toBeNull()
  })

  it('returns nothing for a header-only file', () => {
    expect(parseSymbolMaster('Exchange,Token,Symbol,\n')).toEqual([])
  })
})

describe('SymbolMasterService.load', () => {
  it('downloads the archive and parses its first file', async () => {
    const archive = await zipped({ 'NFO_symbols.txt': MASTER_CSV })
    const { http, calls } = stubAxios(() => ({ status: 200, data: archive }))
    const service = new SymbolMasterService('https://example.test/NFO_symbols.txt.zip', http)

    const rows = await service.load()

    expect(calls).toHaveLength(1)
    expect(calls[0].url).toBe('https://example.test/NFO_symbols.txt.zip')
    expect(calls[0].responseType).toBe('arraybuffer')
    expect(rows.map((row) => row.tradingSymbol)).toEqual([
      'BANKNIFTY29JAN25C50000',
      'BANKNIFTY29JAN25P50000',
      'BANKNIFTY29JAN25F',
      'FINNIFTY28JAN25C23000',
    ])
  })

  it('rejects an archive without files', async () => {
    const archive = await zipped({})
    const { http } = stubAxios(() => ({ status: 200, data: archive }))
    const service = new SymbolMasterService('https://example.test/empty.zip', http)

    await expect(service.load()).rejects.toThrow('Symbol master archive is empty')
  })

  it('propagates a failed download', async () => {
    const { http } = stubAxios(() => ({ status: 404, data: 'not found' }))
    const service = new SymbolMasterService('https://example.test/missing.zip', http)

    await expect(service.load()).rejects.toThrow('Request failed with status code 404')
  })
})
