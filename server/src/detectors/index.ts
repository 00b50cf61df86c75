/**
 * @fileoverview Barrel export for the detectors, plus the default set in
 * canonical report order.
 */

import type { Detector } from './base.js'
import { ConfirmshamingDetector } from './confirmshaming.js'
import { PreselectionDetector } from './preselection.js'
import { HiddenCostsDetector } from './hidden-costs.js'
import { DifficultCancellationDetector } from './difficult-cancellation.js'
import { MisleadingAdsDetector } from './misleading-ads.js'
import { FalseUrgencyDetector } from './false-urgency.js'
import { ConfusingInterfaceDetector } from './confusing-interface.js'

export type { Detector, DetectorOptions, Finding, BaseRules } from './base.js'
export { BaseDetector, createDetection, clampConfidence, screenshotRefFor } from './base.js'
export {
  ConfirmshamingDetector,
  PreselectionDetector,
  HiddenCostsDetector,
  DifficultCancellationDetector,
  MisleadingAdsDetector,
  FalseUrgencyDetector,
  ConfusingInterfaceDetector,
}

/**
 * One instance of every built-in detector, rules read from the rules directory.
 */
export function createDefaultDetectors(): Detector[] {
  return [
    new ConfirmshamingDetector(),
    new PreselectionDetector(),
    new HiddenCostsDetector(),
    new DifficultCancellationDetector(),
    new MisleadingAdsDetector(),
    new FalseUrgencyDetector(),
    new ConfusingInterfaceDetector(),
  ]
}
