/**
 * @fileoverview Barrel export for data modules.
 *
 * Rules are loaded from JSON files in the rules/ directory so lexicons and
 * weights can change without code changes.
 */

// Types and schemas
export type {
  ConfirmshamingRules,
  PreselectionRules,
  HiddenCostsRules,
  DifficultCancellationRules,
  MisleadingAdsRules,
  FalseUrgencyRules,
  ConfusingInterfaceRules,
  SeverityWeights,
} from './types.js'

export {
  confirmshamingRulesSchema,
  preselectionRulesSchema,
  hiddenCostsRulesSchema,
  difficultCancellationRulesSchema,
  misleadingAdsRulesSchema,
  falseUrgencyRulesSchema,
  confusingInterfaceRulesSchema,
  severityWeightsSchema,
} from './types.js'

// Data loaders
export {
  BUILTIN_RULES_DIR,
  setRulesDirectory,
  getRulesDirectory,
  ruleFileName,
  loadDetectorRules,
  getSeverityWeights,
} from './loader.js'
