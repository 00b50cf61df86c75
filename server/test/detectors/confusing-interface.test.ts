import { describe, it, expect } from 'vitest'
import { ConfusingInterfaceDetector } from '../../src/detectors/confusing-interface.js'
import { snapshotFromHtml } from '../helpers.js'

describe('ConfusingInterfaceDetector', () => {
  const detector = new ConfusingInterfaceDetector()

  it('should flag a filled accept button next to a faint decline link', () => {
    const snapshot = snapshotFromHtml(
      '<div class="consent">' +
        '<button class="btn btn-primary" style="background-color: #0d6efd; color: #ffffff; font-size: 18px">Accept all</button>' +
        '<a class="muted" href="#" style="color: #999999; font-size: 12px">No, manage settings</a>' +
        '</div>',
    )

    const detections = detector.detect(snapshot)

    expect(detections).toHaveLength(1)
    expect(detections[0].confidence).toBe(0.85)
    expect(detections[0].location).toBe('button.btn.btn-primary "Accept all" vs a.muted "No, manage settings"')
    expect(detections[0].evidence).toMatchObject({
      acceptText: 'Accept all',
      rejectText: 'No, manage settings',
      linkVsButton: true,
      colorInversion: false,
    })
    expect(detections[0].evidence.asymmetry).toBeCloseTo(0.585, 2)
  })

  it('should not flag equally styled choices', () => {
    const snapshot = snapshotFromHtml(
      '<div><button class="btn">Accept</button><button class="btn">Reject</button></div>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should not pair controls from unrelated parts of the page', () => {
    const snapshot = snapshotFromHtml(
      '<header><nav><ul><li><button class="btn btn-primary" style="font-size: 20px">Accept all</button></li></ul></nav></header>' +
        '<footer><section><div><a class="muted" href="/prefs" style="font-size: 11px">Reject</a></div></section></footer>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })
})
