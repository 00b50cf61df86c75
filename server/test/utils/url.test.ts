import { describe, it, expect } from 'vitest'
import { extractDomain, getBaseDomain, isThirdParty, isValidUrl, urlToFileStem } from '../../src/utils/url.js'

describe('url helpers', () => {
  it('should extract hosts and base domains', () => {
    expect(extractDomain('https://www.example.com/path')).toBe('www.example.com')
    expect(extractDomain('invalid-url')).toBe('unknown')
    expect(getBaseDomain('www.example.com')).toBe('example.com')
    expect(getBaseDomain('shop.example.co.uk')).toBe('example.co.uk')
  })

  it('should tell third-party links from same-site ones', () => {
    expect(isThirdParty('https://ads.tracker.net/c', 'https://shop.example.com/')).toBe(true)
    expect(isThirdParty('https://cdn.example.com/app.js', 'https://shop.example.com/')).toBe(false)
    expect(isThirdParty('/checkout', 'https://shop.example.com/')).toBe(false)
    expect(isThirdParty('mailto:help@tracker.net', 'https://shop.example.com/')).toBe(false)
  })

  it('should accept only absolute http(s) URLs', () => {
    expect(isValidUrl('https://shop.example.com')).toBe(true)
    expect(isValidUrl('ftp://files.example.com')).toBe(false)
    expect(isValidUrl('shop.example.com')).toBe(false)
  })

  it('should build filesystem-safe stems', () => {
    expect(urlToFileStem('https://shop.example.com/cart?id=1')).toBe('shop_example_com')
    expect(urlToFileStem('not a url')).toBe('not_a_url')
  })
})
