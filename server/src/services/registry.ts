/**
 * @fileoverview Detection registry: an ordered set of detectors run
 * against one snapshot.
 *
 * Detectors run in registration order and their detections are merged in
 * that order. A detector that throws is recorded as a failure for the page
 * and the remaining detectors still run.
 */

import type { Detection, DetectorFailure, PageSnapshot } from '../types.js'
import type { Detector } from '../detectors/index.js'
import { ConfigurationError, getErrorMessage } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('Registry')

/** Outcome of running every registered detector on one page */
export interface RegistryRun {
  detections: Detection[]
  failures: DetectorFailure[]
}

/**
 * Throw unless a confidence floor is a number in [0, 1].
 */
export function assertConfidenceFloor(value: number, label = 'globalMinConfidence'): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${label} must be within [0, 1]`, [`got ${value}`])
  }
}

export class DetectionRegistry {
  private readonly detectors: Detector[] = []

  constructor(detectors: readonly Detector[] = []) {
    for (const detector of detectors) {
      this.register(detector)
    }
  }

  /**
   * Append a detector. Names are unique within a registry.
   */
  register(detector: Detector): this {
    if (this.detectors.some((d) => d.name === detector.name)) {
      throw new ConfigurationError(`Detector "${detector.name}" is already registered`)
    }
    this.detectors.push(detector)
    log.debug('Registered detector', { name: detector.name, patternType: detector.patternType })
    return this
  }

  /**
   * Remove a detector by name.
   * @returns Whether a detector was removed
   */
  unregister(name: string): boolean {
    const index = this.detectors.findIndex((d) => d.name === name)
    if (index < 0) return false
    this.detectors.splice(index, 1)
    return true
  }

  /** Registered detectors in run order */
  list(): readonly Detector[] {
    return [...this.detectors]
  }

  get size(): number {
    return this.detectors.length
  }

  /**
   * Run every detector against a snapshot.
   *
   * @param snapshot - The page to scan (never mutated)
   * @param globalMinConfidence - Floor applied on top of each detector's own threshold
   * @throws ConfigurationError when the floor is outside [0, 1]
   */
  runAll(snapshot: PageSnapshot, globalMinConfidence = 0): RegistryRun {
    assertConfidenceFloor(globalMinConfidence)

    const detections: Detection[] = []
    const failures: DetectorFailure[] = []

    for (const detector of this.detectors) {
      try {
        for (const detection of detector.detect(snapshot)) {
          if (detection.confidence >= globalMinConfidence) {
            detections.push(detection)
          }
        }
      } catch (error) {
        const message = getErrorMessage(error)
        log.error('Detector crashed', { detector: detector.name, url: snapshot.url, error: message })
        failures.push({ detector: detector.name, patternType: detector.patternType, error: message })
      }
    }

    log.debug('Registry run complete', {
      url: snapshot.url,
      detections: detections.length,
      failures: failures.length,
    })
    return { detections, failures }
  }
}
