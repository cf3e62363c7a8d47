import { describe, it, expect } from 'vitest'
import { Readable } from 'stream'
import ExcelJS from 'exceljs'
import JSZip from 'jszip'
import { ARCHIVE_COLUMNS, buildZip, candlesToXlsx, entryNameFor } from '../services/ArchiveWriter'
import { SnapshotAccumulator } from '../services/SnapshotAccumulator'

describe('candlesToXlsx', () => {
  it('writes a header row and one row per candle', async () => {
    const bytes = await candlesToXlsx([
      { date: new Date('2025-01-29T09:15:00.000Z'), open: 210, high: 214, low: 208.5, close: 212, volume: 4500 },
      { date: new Date('2025-01-29T09:16:00.000Z'), open: 212, high: 213, low: 205, close: 206.4, volume: 3900 },
    ])

    const workbook = new ExcelJS.Workbook()
    await workbook.xlsx.read(Readable.from([bytes]))
    const sheet = workbook.worksheets[0]

    expect(sheet.rowCount).toBe(3)
    expect(ARCHIVE_COLUMNS.map((_, i) => sheet.getRow(1).getCell(i + 1).value)).toEqual([
      'Date',
      'Open',
      'High',
      'Low',
      'Close',
      'Volume',
    ])
    expect(sheet.getRow(2).getCell(1).value).toEqual(new Date('2025-01-29T09:15:00.000Z'))
    expect([2, 3, 4, 5, 6].map((col) => sheet.getRow(3).getCell(col).value)).toEqual([212, 213, 205, 206.4, 3900])
  })
})

describe('buildZip', () => {
  it('keeps entries under their names', async () => {
    const zipped = await buildZip([
      { name: entryNameFor('FINNIFTY28JAN25C23000'), bytes: Buffer.from('a') },
      { name: entryNameFor('FINNIFTY28JAN25P23000'), bytes: Buffer.from('b') },
    ])

    const zip = await JSZip.loadAsync(zipped)
    expect(Object.keys(zip.files)).toEqual(['FINNIFTY28JAN25C23000.xlsx', 'FINNIFTY28JAN25P23000.xlsx'])
    expect(await zip.file('FINNIFTY28JAN25P23000.xlsx')?.async('string')).toBe('b')
  })
})

describe('SnapshotAccumulator', () => {
  it('keeps entries and tally in step', async () => {
    const accumulator = new SnapshotAccumulator()
    accumulator.record({ symbol: 'A', status: 'stored', bytes: Buffer.from('1') })
    accumulator.record({ symbol: 'B', status: 'failed', reason: 'No data' })
    accumulator.record({ symbol: 'C', status: 'stored', bytes: Buffer.from('3') })

    expect(accumulator.entryCount).toBe(2)
    expect(accumulator.succeeded).toEqual(['A', 'C'])
    expect(accumulator.failed).toEqual([{ symbol: 'B', reason: 'No data' }])
  })

  it('refuses writes after finalize', async () => {
    const accumulator = new SnapshotAccumulator()
    accumulator.record({ symbol: 'A', status: 'stored', bytes: Buffer.from('1') })

    expect(await accumulator.finalize()).toBeInstanceOf(Buffer)
    expect(() => accumulator.record({ symbol: 'B', status: 'stored', bytes: Buffer.from('2') })).toThrow(
      'Archive already finalised, cannot record B'
    )
  })

  it('finalizes to null when nothing was stored', async () => {
    const accumulator = new SnapshotAccumulator()
    accumulator.record({ symbol: 'A', status: 'failed', reason: 'No data' })
    expect(await accumulator.finalize()).toBeNull()
  })
})
