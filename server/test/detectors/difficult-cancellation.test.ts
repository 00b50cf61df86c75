import { describe, it, expect } from 'vitest'
import { DifficultCancellationDetector } from '../../src/detectors/difficult-cancellation.js'
import { snapshotFromHtml } from '../helpers.js'

describe('DifficultCancellationDetector', () => {
  const detector = new DifficultCancellationDetector()

  it('should flag phone-only cancellation next to a one-click sign-up', () => {
    const snapshot = snapshotFromHtml(
      '<button class="btn-primary">Start free trial</button>' +
        '<p>To cancel your subscription, please call us at <a href="tel:+18005550100">1-800-555-0100</a>.</p>',
    )

    const detections = detector.detect(snapshot)

    expect(detections).toHaveLength(1)
    expect(detections[0].confidence).toBe(0.775)
    expect(detections[0].location).toMatch(/^p "To cancel your subscription, please call us at/)
    expect(detections[0].evidence).toEqual({
      cancelMentions: ['cancel'],
      obstructionPhrases: ['to cancel your subscription, please call'],
      signUpControls: ['start free trial'],
      cancelControls: [],
      contactChannels: ['tel:+18005550100'],
      phoneNumberInText: true,
    })
  })

  it('should not flag a page with an online cancel control', () => {
    const snapshot = snapshotFromHtml(
      '<button>Subscribe</button><a href="/account/cancel">Cancel subscription</a>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should ignore pages that never mention cancelling', () => {
    const snapshot = snapshotFromHtml('<button>Sign up</button><p>Call us at 0800 123 4567</p>')
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should count a plain-text number in the sentence that mentions calling', () => {
    const snapshot = snapshotFromHtml('<button>Join now</button><p>Need to cancel? Call 0800 123 4567.</p>')

    const [detection] = detector.detect(snapshot)

    expect(detection.confidence).toBe(0.775)
    expect(detection.evidence).toMatchObject({
      obstructionPhrases: ['to cancel? call'],
      contactChannels: [],
      phoneNumberInText: true,
    })
  })

  it('should not read a copyright year range as a phone number', () => {
    const snapshot = snapshotFromHtml(
      '<button>Start free trial</button><p>Cancel anytime.</p><footer>© 2019 - 2024 Shop Ltd</footer>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should grade asymmetry by the share of sign-ups without a cancel control', () => {
    const snapshot = snapshotFromHtml(
      '<button>Subscribe</button><button>Start free trial</button><a href="/cancel">Cancel</a>' +
        '<p>Cancellation fee applies. 30 days notice required.</p>',
    )

    const [detection] = detector.detect(snapshot)

    expect(detection.confidence).toBe(0.625)
    expect(detection.evidence).toMatchObject({
      obstructionPhrases: ['30 days notice', 'cancellation fee'],
      signUpControls: ['subscribe', 'start free trial'],
      cancelControls: ['cancel'],
      phoneNumberInText: false,
    })
  })
})
