/**
 * @fileoverview Schemas for the detector rule files under ./rules.
 * Each detector reads one file holding its signal weights, tunable
 * parameters and lexicon; the severity table lives in its own file.
 */

import { z } from 'zod'

// ============================================================================
// Building Blocks
// ============================================================================

/** A weight or threshold in [0, 1] */
const unit = z.number().min(0).max(1)

/** A non-empty list of lower-case terms */
const terms = z.array(z.string().min(1)).min(1)

/** A non-empty list of regular expression sources */
const patterns = z.array(
  z.string().min(1).refine(
    (source) => {
      try {
        new RegExp(source, 'i')
        return true
      } catch {
        return false
      }
    },
    { message: 'not a valid regular expression' },
  ),
).min(1)

const positive = z.number().positive()

// ============================================================================
// Detector Rules
// ============================================================================

export const confirmshamingRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z.object({ phraseMatch: unit, negationLoss: unit, dismissRole: unit }).strict(),
    params: z
      .object({ fuzzyThreshold: unit, fuzzyFactor: unit, maxTextLength: z.number().int().positive() })
      .strict(),
    lexicon: z
      .object({ phrases: terms, negationWords: terms, lossWords: terms, dismissMarkers: terms })
      .strict(),
  })
  .strict()

export const preselectionRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z.object({ preChecked: unit, labelMatch: unit, deEmphasis: unit }).strict(),
    params: z
      .object({
        keywordSaturation: positive,
        deEmphasisSaturation: positive,
        smallFontPx: positive,
        lowOpacity: unit,
        lowContrastRatio: positive,
      })
      .strict(),
    lexicon: z.object({ keywords: terms, deEmphasisClasses: terms }).strict(),
  })
  .strict()

export const hiddenCostsRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z.object({ discrepancy: unit, extraCharges: unit, finePrint: unit }).strict(),
    params: z
      .object({
        materialThreshold: unit,
        discrepancySaturation: positive,
        extraChargeSaturation: positive,
        proximityLevels: z.number().int().min(0),
        smallFontPx: positive,
      })
      .strict(),
    lexicon: z
      .object({ totalKeywords: terms, feeKeywords: terms, disclaimerPatterns: patterns, finePrintClasses: terms })
      .strict(),
  })
  .strict()

export const difficultCancellationRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z.object({ obstruction: unit, asymmetry: unit, contactOnly: unit }).strict(),
    params: z.object({ obstructionSaturation: positive }).strict(),
    lexicon: z
      .object({
        cancelMentions: terms,
        cancelActions: terms,
        subscribeActions: terms,
        contactMentions: terms,
        obstructionPatterns: patterns,
        phonePattern: z.string().min(1),
      })
      .strict(),
  })
  .strict()

export const misleadingAdsRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z
      .object({
        undisclosed: unit,
        disclosed: unit,
        controlMimicry: unit,
        plainLink: unit,
        externalAdDestination: unit,
        externalDestination: unit,
        internalAdDestination: unit,
        adContainer: unit,
      })
      .strict(),
    params: z.object({ promoSaturation: positive, disclosureLevels: z.number().int().min(0) }).strict(),
    lexicon: z
      .object({
        disclosureLabels: terms,
        controlClasses: terms,
        controlTexts: terms,
        adUrlPatterns: patterns,
        adContainerTokens: terms,
        promoKeywords: terms,
      })
      .strict(),
  })
  .strict()

export const falseUrgencyRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z
      .object({
        repeatedScarcity: unit,
        staticCountdown: unit,
        unreasonableTarget: unit,
        repeatedCountdown: unit,
        urgencyLanguage: unit,
      })
      .strict(),
    params: z.object({ minSignals: z.number().int().min(1), maxHorizonHours: positive }).strict(),
    lexicon: z
      .object({
        countdownTokens: terms,
        countdownCues: terms,
        targetAttributes: terms,
        urgencyPhrases: terms,
        scarcityPatterns: patterns,
      })
      .strict(),
  })
  .strict()

export const confusingInterfaceRulesSchema = z
  .object({
    minConfidence: unit,
    weights: z.object({ asymmetry: unit, linkVsButton: unit, colorInversion: unit }).strict(),
    visualWeights: z.object({ size: unit, fill: unit, contrast: unit, prominence: unit }).strict(),
    params: z
      .object({
        asymmetrySaturation: positive,
        minAsymmetry: unit,
        defaultFontPx: positive,
        maxFontPx: positive,
        maxContrast: positive,
        groupLevels: z.number().int().min(1),
      })
      .strict(),
    lexicon: z
      .object({
        acceptActions: terms,
        rejectActions: terms,
        primaryClasses: terms,
        mutedClasses: terms,
        buttonClasses: terms,
        sizeClasses: z.record(positive),
      })
      .strict(),
  })
  .strict()

export type ConfirmshamingRules = z.infer<typeof confirmshamingRulesSchema>
export type PreselectionRules = z.infer<typeof preselectionRulesSchema>
export type HiddenCostsRules = z.infer<typeof hiddenCostsRulesSchema>
export type DifficultCancellationRules = z.infer<typeof difficultCancellationRulesSchema>
export type MisleadingAdsRules = z.infer<typeof misleadingAdsRulesSchema>
export type FalseUrgencyRules = z.infer<typeof falseUrgencyRulesSchema>
export type ConfusingInterfaceRules = z.infer<typeof confusingInterfaceRulesSchema>

// ============================================================================
// Severity Weights
// ============================================================================

const severityWeight = z.number().gt(0).max(1)

/** One weight per pattern type; unknown keys are rejected */
export const severityWeightsSchema = z
  .object({
    confirmshaming: severityWeight,
    preselection: severityWeight,
    hidden_costs: severityWeight,
    difficult_cancellation: severityWeight,
    misleading_ads: severityWeight,
    false_urgency: severityWeight,
    confusing_interface: severityWeight,
  })
  .strict()

export type SeverityWeights = z.infer<typeof severityWeightsSchema>
