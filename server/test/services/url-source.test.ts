import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import {
  cleanUrlRecords,
  formatFromPath,
  loadUrlFile,
  parseUrlList,
  splitCsvRecords,
} from '../../src/services/url-source.js'
import { ConfigurationError } from '../../src/utils/errors.js'

const A = 'https://a.example.com/'
const B = 'https://b.example.com/'

describe('splitCsvRecords', () => {
  it('should honour quoted fields and doubled quotes', () => {
    expect(splitCsvRecords('a,"b ""c"", d", e ')).toEqual([['a', 'b "c", d', 'e']])
  })

  it('should keep line breaks inside quoted fields and drop blank records', () => {
    expect(splitCsvRecords('url,notes\r\nx,"first line\r\nsecond line"\n\n y ,z\r\n')).toEqual([
      ['url', 'notes'],
      ['x', 'first line\r\nsecond line'],
      ['y', 'z'],
    ])
  })
})

describe('parseUrlList', () => {
  it('should read the url column of a CSV with extra columns', () => {
    const csv = [
      'name,website,category,notes',
      'Shop,https://shop.example.com,retail,"Checkout, cart"',
      'Bad,not-a-url,,',
      'Again,https://shop.example.com,,',
      'News,https://news.example.org/,media,',
    ].join('\n')

    expect(parseUrlList(csv, 'csv')).toEqual([
      { url: 'https://shop.example.com', category: 'retail', notes: 'Checkout, cart' },
      { url: 'https://news.example.org/', category: 'media', notes: null },
    ])
  })

  it('should read a quoted multi-line note as one record', () => {
    const csv = `url,notes\n${A},"Checkout flow\nsee cart page"\n${B},\n`

    expect(parseUrlList(csv, 'csv')).toEqual([
      { url: A, category: null, notes: 'Checkout flow\nsee cart page' },
      { url: B, category: null, notes: null },
    ])
  })

  it('should treat a CSV without a header as data', () => {
    expect(parseUrlList(`${A}\r\n${B}\r\n`, 'csv').map((r) => r.url)).toEqual([A, B])
  })

  it('should read strings and url-ish keys from a JSON array', () => {
    const json = JSON.stringify([A, { url: B, category: 'shop' }, { link: 'ftp://files.example.com/' }, 42])

    expect(parseUrlList(json, 'json')).toEqual([
      { url: A, category: null, notes: null },
      { url: B, category: 'shop', notes: null },
    ])
  })

  it('should read url-ish keys of a JSON object', () => {
    const json = JSON.stringify({ urls: [A], site: B, owner: 'https://ignored.example.com/' })
    expect(parseUrlList(json, 'json').map((r) => r.url)).toEqual([A, B])
  })

  it('should reject malformed JSON', () => {
    expect(() => parseUrlList('[', 'json')).toThrow(ConfigurationError)
  })

  it('should skip comments and blank lines in TXT', () => {
    expect(parseUrlList(`# shops\n\n${A}\n   ${B}   \n`, 'txt').map((r) => r.url)).toEqual([A, B])
  })
})

describe('cleanUrlRecords', () => {
  it('should keep the first of duplicate URLs', () => {
    const records = [
      { url: A, category: 'first', notes: null },
      { url: ` ${A} `, category: 'second', notes: null },
    ]
    expect(cleanUrlRecords(records)).toEqual([{ url: A, category: 'first', notes: null }])
  })
})

describe('formatFromPath', () => {
  it('should map extensions case-insensitively', () => {
    expect(formatFromPath('sites.CSV')).toBe('csv')
    expect(formatFromPath('/tmp/sites.json')).toBe('json')
    expect(formatFromPath('sites.txt')).toBe('txt')
  })

  it('should reject other extensions', () => {
    expect(() => formatFromPath('sites.xml')).toThrow('Unsupported URL file format: .xml')
    expect(() => formatFromPath('sites')).toThrow('Unsupported URL file format: (none)')
  })
})

describe('loadUrlFile', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'urls-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('should load a file by its extension', async () => {
    const path = join(directory, 'sites.txt')
    await writeFile(path, `${A}\n${B}\n`, 'utf-8')

    expect((await loadUrlFile(path)).map((r) => r.url)).toEqual([A, B])
  })

  it('should report a missing file as a configuration error', async () => {
    await expect(loadUrlFile(join(directory, 'absent.json'))).rejects.toThrow(/^Cannot read URL file /)
  })
})
