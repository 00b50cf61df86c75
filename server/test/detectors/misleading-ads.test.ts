import { describe, it, expect } from 'vitest'
import { MisleadingAdsDetector } from '../../src/detectors/misleading-ads.js'
import { snapshotFromHtml } from '../helpers.js'

describe('MisleadingAdsDetector', () => {
  const detector = new MisleadingAdsDetector()

  it('should flag an unlabelled ad link styled as a download button', () => {
    const snapshot = snapshotFromHtml(
      '<div class="downloads"><a class="btn btn-success" href="https://tracker.example-ads.net/click?id=42">Download Now</a></div>',
    )

    const detections = detector.detect(snapshot)

    expect(detections).toHaveLength(1)
    expect(detections[0].confidence).toBe(1)
    expect(detections[0].location).toBe('a.btn.btn-success "Download Now"')
    expect(detections[0].evidence).toMatchObject({
      href: 'https://tracker.example-ads.net/click?id=42',
      external: true,
      adUrlPattern: '/click\\b',
      mimicsControl: true,
      controlClasses: ['btn'],
      disclosureLabel: null,
    })
  })

  it('should let a visible sponsor label pull the score under the threshold', () => {
    const snapshot = snapshotFromHtml(
      '<div class="card"><span>Sponsored</span><a class="btn" href="https://tracker.example-ads.net/click?id=7">Download Now</a></div>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should flag an unlabelled ad slot full of promotional copy', () => {
    const snapshot = snapshotFromHtml(
      '<aside class="ad-slot"><p>Huge deal! 50% off, buy now with free shipping</p></aside>',
    )

    const [detection] = detector.detect(snapshot)

    expect(detection.confidence).toBe(0.8)
    expect(detection.location).toBe('aside.ad-slot "Huge deal! 50% off, buy now with free shipping"')
    expect(detection.evidence).toEqual({
      containerTokens: ['ad'],
      promoKeywords: ['free', 'deal', '% off', 'buy now'],
      disclosureLabel: null,
    })
  })

  it('should leave internal navigation links alone', () => {
    const snapshot = snapshotFromHtml('<nav><a href="/products">Products</a><a href="#top">Top</a></nav>')
    expect(detector.detect(snapshot)).toEqual([])
  })
})
