import { describe, it, expect } from 'vitest'
import type { Detector } from '../../src/detectors/index.js'
import { createDefaultDetectors } from '../../src/detectors/index.js'
import { DetectionRegistry } from '../../src/services/registry.js'
import { PATTERN_TYPES, type Detection, type PatternType } from '../../src/types.js'
import { ConfigurationError } from '../../src/utils/errors.js'
import { detection, snapshotFromHtml } from '../helpers.js'

const MIXED_PAGE =
  '<div class="modal"><button>No thanks, I enjoy paying full price</button></div>' +
  '<form><label><input type="checkbox" name="marketing" checked> Subscribe me to marketing emails</label></form>' +
  '<button class="btn-primary">Start free trial</button>' +
  '<p>To cancel your subscription, please call us at <a href="tel:+18005550100">1-800-555-0100</a>.</p>' +
  '<div class="countdown-timer">00:14:59</div><p>Hurry! Only 3 left in stock</p>' +
  '<aside class="ad-slot"><p>Huge deal! 50% off, buy now with free shipping</p></aside>' +
  '<div class="product"><h2>Annual plan</h2><span class="price">$49.99</span></div>' +
  '<div class="checkout"><div class="row">Service fee $9.99</div><div class="total">Total $59.98</div></div>'

function stubDetector(name: string, patternType: PatternType, detections: Detection[]): Detector {
  return { name, patternType, minConfidence: 0, detect: () => detections }
}

function crashingDetector(name: string): Detector {
  return {
    name,
    patternType: 'misleading_ads',
    minConfidence: 0,
    detect: () => {
      throw new TypeError('cannot read properties of undefined')
    },
  }
}

describe('DetectionRegistry', () => {
  const snapshot = snapshotFromHtml('<p>Nothing to see</p>')

  it('should merge detections in registration order', () => {
    const registry = new DetectionRegistry([
      stubDetector('urgency', 'false_urgency', [detection('false_urgency', 0.6)]),
      stubDetector('shaming', 'confirmshaming', [detection('confirmshaming', 0.9)]),
    ])

    const run = registry.runAll(snapshot)

    expect(run.detections.map((d) => d.patternType)).toEqual(['false_urgency', 'confirmshaming'])
    expect(run.failures).toEqual([])
  })

  it('should record a crashing detector and keep running the rest', () => {
    const registry = new DetectionRegistry([
      crashingDetector('ads'),
      stubDetector('shaming', 'confirmshaming', [detection('confirmshaming', 0.9)]),
    ])

    const run = registry.runAll(snapshot)

    expect(run.detections).toHaveLength(1)
    expect(run.failures).toEqual([
      { detector: 'ads', patternType: 'misleading_ads', error: 'cannot read properties of undefined' },
    ])
  })

  it('should apply the global confidence floor inclusively', () => {
    const registry = new DetectionRegistry([
      stubDetector('urgency', 'false_urgency', [
        detection('false_urgency', 0.3),
        detection('false_urgency', 0.5),
        detection('false_urgency', 0.7),
      ]),
    ])

    expect(registry.runAll(snapshot, 0.5).detections.map((d) => d.confidence)).toEqual([0.5, 0.7])
  })

  it('should reject a floor outside the unit range', () => {
    const registry = new DetectionRegistry()
    expect(() => registry.runAll(snapshot, 1.5)).toThrow(ConfigurationError)
    expect(() => registry.runAll(snapshot, -0.1)).toThrow('globalMinConfidence must be within [0, 1]: got -0.1')
  })

  it('should refuse duplicate names and support removal', () => {
    const registry = new DetectionRegistry([stubDetector('shaming', 'confirmshaming', [])])

    expect(() => registry.register(stubDetector('shaming', 'confirmshaming', []))).toThrow(
      'Detector "shaming" is already registered',
    )
    expect(registry.unregister('shaming')).toBe(true)
    expect(registry.unregister('shaming')).toBe(false)
    expect(registry.size).toBe(0)
  })

  it('should hold the seven built-in detectors in canonical order', () => {
    const registry = new DetectionRegistry(createDefaultDetectors())
    expect(registry.list().map((d) => d.patternType)).toEqual([
      'confirmshaming',
      'preselection',
      'hidden_costs',
      'difficult_cancellation',
      'misleading_ads',
      'false_urgency',
      'confusing_interface',
    ])
  })

  it('should find nothing on a neutral page', () => {
    const registry = new DetectionRegistry(createDefaultDetectors())
    const run = registry.runAll(snapshotFromHtml('<h1>About us</h1><p>We make tea.</p>'))
    expect(run).toEqual({ detections: [], failures: [] })
  })

  it('should return identical results for repeated runs on one snapshot', () => {
    const registry = new DetectionRegistry(createDefaultDetectors())
    const snapshot = snapshotFromHtml(MIXED_PAGE)

    const first = registry.runAll(snapshot)
    const second = registry.runAll(snapshot)

    expect(second).toEqual(first)
    expect(first.detections.map((d) => d.patternType)).toEqual(
      expect.arrayContaining(['confirmshaming', 'preselection', 'difficult_cancellation']),
    )
  })

  it('should keep every built-in detection within the unit range and the known pattern types', () => {
    const registry = new DetectionRegistry(createDefaultDetectors())
    const pages = [MIXED_PAGE, '<h1>About us</h1><p>We make tea.</p>', '<p>Cancel anytime.</p><p>Hurry!</p>']

    const detections = pages.flatMap((body) => registry.runAll(snapshotFromHtml(body)).detections)

    expect(detections.length).toBeGreaterThan(0)
    for (const found of detections) {
      expect(found.confidence).toBeGreaterThanOrEqual(0)
      expect(found.confidence).toBeLessThanOrEqual(1)
      expect(PATTERN_TYPES).toContain(found.patternType)
    }
  })
})
