import { describe, it, expect } from 'vitest'
import { PreselectionDetector } from '../../src/detectors/preselection.js'
import { snapshotFromHtml } from '../helpers.js'

describe('PreselectionDetector', () => {
  const detector = new PreselectionDetector()

  it('should flag a pre-checked marketing opt-in', () => {
    const snapshot = snapshotFromHtml(
      '<form><label><input type="checkbox" name="marketing" checked> Subscribe me to marketing emails</label></form>',
    )

    const detections = detector.detect(snapshot)

    expect(detections).toHaveLength(1)
    expect(detections[0].confidence).toBe(0.85)
    expect(detections[0].location).toBe('input[type=checkbox][name=marketing] "Subscribe me to marketing emails"')
    expect(detections[0].evidence).toMatchObject({
      label: 'Subscribe me to marketing emails',
      inputType: 'checkbox',
      preChecked: true,
      matchedKeywords: ['marketing', 'subscribe', 'emails'],
      deEmphasis: [],
    })
  })

  it('should add weight when the label is fine print', () => {
    const snapshot = snapshotFromHtml(
      '<div class="fine-print" style="font-size: 10px"><input type="checkbox" id="ins" checked><label for="ins">Add travel insurance</label></div>',
    )

    const [detection] = detector.detect(snapshot)

    expect(detection.confidence).toBe(0.775)
    expect(detection.evidence).toMatchObject({
      inputName: 'ins',
      matchedKeywords: ['insurance'],
      deEmphasis: ['small-font', 'muted-class'],
    })
  })

  it('should read aria-checked switches', () => {
    const snapshot = snapshotFromHtml(
      '<div role="switch" aria-checked="true" aria-label="Share my data with partners"></div>',
    )
    const [detection] = detector.detect(snapshot)
    expect(detection.evidence).toMatchObject({ inputType: 'switch', matchedKeywords: ['partners', 'share my'] })
  })

  it('should ignore pre-checked boxes without an opt-in keyword', () => {
    const snapshot = snapshotFromHtml('<label><input type="checkbox" checked> Remember me</label>')
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should ignore unchecked opt-ins', () => {
    const snapshot = snapshotFromHtml('<label><input type="checkbox"> Send me the newsletter</label>')
    expect(detector.detect(snapshot)).toEqual([])
  })

  it('should flag a pre-selected upsell option in a select', () => {
    const snapshot = snapshotFromHtml(
      '<label for="plan">Plan</label><select id="plan"><option>Basic</option><option selected>Premium membership with auto-renew</option></select>',
    )

    const detections = detector.detect(snapshot)

    expect(detections).toHaveLength(1)
    expect(detections[0].confidence).toBe(0.85)
    expect(detections[0].location).toBe('select[name=plan] option "Premium membership with auto-renew"')
    expect(detections[0].evidence).toMatchObject({
      label: 'Plan',
      selectedOption: 'Premium membership with auto-renew',
      inputType: 'select',
      inputName: 'plan',
      matchedKeywords: ['premium', 'auto-renew', 'membership'],
      deEmphasis: [],
    })
  })

  it('should read keywords from the label of a select', () => {
    const snapshot = snapshotFromHtml(
      '<label>Donation <select name="tip"><option selected>5 EUR</option><option>None</option></select></label>',
    )
    const [detection] = detector.detect(snapshot)
    expect(detection.confidence).toBe(0.625)
    expect(detection.evidence).toMatchObject({ selectedOption: '5 EUR', matchedKeywords: ['donation'] })
  })

  it('should ignore a select whose chosen option is neutral', () => {
    const snapshot = snapshotFromHtml(
      '<label for="plan">Plan</label><select id="plan"><option selected>Basic</option><option>Premium</option></select>',
    )
    expect(detector.detect(snapshot)).toEqual([])
  })
})
