import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import {
  BUILTIN_RULES_DIR,
  getRulesDirectory,
  getSeverityWeights,
  ruleFileName,
  setRulesDirectory,
} from '../../src/data/index.js'
import { ConfirmshamingDetector } from '../../src/detectors/confirmshaming.js'
import { SeverityScorer } from '../../src/services/severity.js'
import { ConfigurationError } from '../../src/utils/errors.js'

describe('ruleFileName', () => {
  it('should turn a pattern type into a kebab-case file name', () => {
    expect(ruleFileName('hidden_costs')).toBe('hidden-costs.json')
    expect(ruleFileName('confirmshaming')).toBe('confirmshaming.json')
  })
})

describe('built-in rules', () => {
  it('should ship the severity weights', () => {
    expect(getRulesDirectory()).toBe(BUILTIN_RULES_DIR)
    expect(getSeverityWeights()).toMatchObject({ hidden_costs: 0.9, preselection: 0.7 })
  })
})

describe('custom rules directory', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'rules-'))
    setRulesDirectory(directory)
  })

  afterEach(async () => {
    setRulesDirectory(null)
    await rm(directory, { recursive: true, force: true })
  })

  it('should read detector rules from the configured directory', async () => {
    const builtin = JSON.parse(await readFile(join(BUILTIN_RULES_DIR, 'confirmshaming.json'), 'utf-8'))
    await writeFile(join(directory, 'confirmshaming.json'), JSON.stringify({ ...builtin, minConfidence: 0.9 }))

    expect(new ConfirmshamingDetector().minConfidence).toBe(0.9)
  })

  it('should fail on a missing rule file', () => {
    expect(() => new ConfirmshamingDetector()).toThrow(/^Cannot read rule file /)
  })

  it('should fail on a rule file that is not JSON', async () => {
    await writeFile(join(directory, 'severity-weights.json'), '{ "confirmshaming": ')
    expect(() => new SeverityScorer()).toThrow(/is not valid JSON/)
  })

  it('should fail on a weight table with unknown keys', async () => {
    const builtin = JSON.parse(await readFile(join(BUILTIN_RULES_DIR, 'severity-weights.json'), 'utf-8'))
    await writeFile(join(directory, 'severity-weights.json'), JSON.stringify({ ...builtin, dark_magic: 0.5 }))

    expect(() => new SeverityScorer()).toThrow(ConfigurationError)
    expect(() => new SeverityScorer()).toThrow(/^Invalid rule file severity-weights\.json/)
  })
})
