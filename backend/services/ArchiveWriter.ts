// services/ArchiveWriter.ts
import ExcelJS from 'exceljs'
import JSZip from 'jszip'
import { ArchiveEntry, CandleRecord } from './types'

export const ARCHIVE_COLUMNS = ['Date', 'Open', 'High', 'Low', 'Close', 'Volume'] as const
export const ENTRY_EXTENSION = '.xlsx'

export function entryNameFor(tradingSymbol: string): string {
  return `${tradingSymbol}${ENTRY_EXTENSION}`
}

/**
 * One worksheet, header row then one row per candle in the given order.
 */
export async function candlesToXlsx(candles: CandleRecord[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook()
  const sheet = workbook.addWorksheet('Sheet1')
  sheet.columns = ARCHIVE_COLUMNS.map((header) => ({
    header,
    key: header,
    width: header === 'Date' ? 20 : 12,
    style: header === 'Date' ? { numFmt: 'yyyy-mm-dd hh:mm:ss' } : {},
  }))

  for (const candle of candles) {
    sheet.addRow([candle.date, candle.open, candle.high, candle.low, candle.close, candle.volume])
  }

  return Buffer.from(await workbook.xlsx.writeBuffer())
}

export async function buildZip(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const zip = new JSZip()
  for (const entry of entries) {
    zip.file(entry.name, entry.bytes)
  }
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
}
