import { describe, it, expect } from 'vitest'
import { clampConfidence, createDetection, screenshotRefFor } from '../../src/detectors/base.js'
import { ConfirmshamingDetector } from '../../src/detectors/confirmshaming.js'
import { PreselectionDetector } from '../../src/detectors/preselection.js'
import type { DomNode, PageSnapshot } from '../../src/types.js'
import { ConfigurationError } from '../../src/utils/errors.js'
import { CAPTURED_AT, PAGE_URL, el } from '../helpers.js'

function rawSnapshot(domTree: DomNode | null): PageSnapshot {
  return {
    url: PAGE_URL,
    title: '',
    domTree,
    textContent: '',
    screenshotRefs: {},
    capturedAt: CAPTURED_AT,
  }
}

describe('clampConfidence', () => {
  it('should clamp to the unit range and round to three decimals', () => {
    expect(clampConfidence(1.4)).toBe(1)
    expect(clampConfidence(-0.2)).toBe(0)
    expect(clampConfidence(0.12345)).toBe(0.123)
    expect(clampConfidence(Number.NaN)).toBe(0)
  })
})

describe('createDetection', () => {
  it('should freeze the detection and its evidence', () => {
    const detection = createDetection({
      patternType: 'preselection',
      confidence: 0.9,
      location: 'input#news',
      evidence: { keywords: ['newsletter'] },
      url: PAGE_URL,
    })

    expect(Object.isFrozen(detection)).toBe(true)
    expect(Object.isFrozen(detection.evidence)).toBe(true)
    expect(detection.screenshotRef).toBeNull()
  })
})

describe('screenshotRefFor', () => {
  it('should prefer the element capture, then the full page, then the viewport', () => {
    const node = el('button', { id: 'decline' })
    const refs = { 'element:decline': 'a.png', full: 'b.png', viewport: 'c.png' }
    const snapshot = { ...rawSnapshot(null), screenshotRefs: refs }

    expect(screenshotRefFor(snapshot, node)).toBe('element:decline')
    expect(screenshotRefFor(snapshot, el('button'))).toBe('full')
    expect(screenshotRefFor({ ...snapshot, screenshotRefs: { viewport: 'c.png' } })).toBe('viewport')
    expect(screenshotRefFor(rawSnapshot(null))).toBeNull()
  })
})

describe('BaseDetector', () => {
  it('should return nothing for a snapshot without a DOM', () => {
    expect(new ConfirmshamingDetector().detect(rawSnapshot(null))).toEqual([])
  })

  it('should return nothing for a malformed DOM', () => {
    const broken: DomNode = JSON.parse(
      '{"tag":"body","attributes":{},"text":"No thanks","children":[{"tag":"button","text":"No thanks"}]}',
    )
    expect(new ConfirmshamingDetector().detect(rawSnapshot(broken))).toEqual([])
    expect(new PreselectionDetector().detect(rawSnapshot(broken))).toEqual([])
  })

  it('should reject a confidence floor outside the unit range', () => {
    expect(() => new ConfirmshamingDetector({ minConfidence: 1.5 })).toThrow(ConfigurationError)
  })

  it('should reject a weight override outside the unit range', () => {
    expect(() => new ConfirmshamingDetector({ weights: { phraseMatch: 2 } })).toThrow(
      'Detector weights must be within [0, 1]: phraseMatch: 2',
    )
  })
})
