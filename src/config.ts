/**
 * @file config.ts
 * @description Builds a Policy from a JSON policy description
 */

import {readFileSync} from 'fs'
import {SOURCE_FLAGS} from './constants'
import {Directive} from './directive'
import {PolicyConfigError} from './errors'
import {isHashAlgorithm} from './hash'
import {Policy} from './policy'
import type {HashAlgorithm, Logger, SourceFlag} from './types'

export interface HashConfig {
  algorithm: HashAlgorithm
  content: string
}

export interface DirectiveConfig {
  keywords?: SourceFlag[]
  sources?: string[]
  hashes?: HashConfig[]
  all?: boolean
  none?: boolean
}

export interface PolicyConfig {
  starter?: boolean
  upgradeInsecureRequests?: boolean
  reportUri?: string
  noncePlaceholder?: string
  /** A list of strings is shorthand for `{sources: [...]}`. */
  directives?: Record<string, DirectiveConfig | string[]>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isSourceFlag(value: unknown): value is SourceFlag {
  return SOURCE_FLAGS.some((flag) => flag === value)
}

function optionalBoolean(
  obj: Record<string, unknown>,
  key: string,
  path: string,
): boolean | undefined {
  const value = obj[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') {
    throw new PolicyConfigError(path + key, 'expected a boolean')
  }
  return value
}

function optionalString(
  obj: Record<string, unknown>,
  key: string,
  path: string,
): string | undefined {
  const value = obj[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new PolicyConfigError(path + key, 'expected a string')
  }
  return value
}

function stringList(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) {
    throw new PolicyConfigError(path, 'expected an array of strings')
  }
  return value.map((item, i) => {
    if (typeof item !== 'string') {
      throw new PolicyConfigError(`${path}[${i}]`, 'expected a string')
    }
    return item
  })
}

function parseHashes(value: unknown, path: string): HashConfig[] {
  if (!Array.isArray(value)) {
    throw new PolicyConfigError(path, 'expected an array')
  }
  return value.map((item, i) => {
    const at = `${path}[${i}]`
    if (!isRecord(item)) throw new PolicyConfigError(at, 'expected an object')
    const {algorithm, content} = item
    if (!isHashAlgorithm(algorithm)) {
      throw new PolicyConfigError(`${at}.algorithm`, 'expected 256, 384 or 512')
    }
    if (typeof content !== 'string') {
      throw new PolicyConfigError(`${at}.content`, 'expected a string')
    }
    return {algorithm, content}
  })
}

/**
 * Validates one directive entry and turns it into a Directive.
 */
export function parseDirective(value: unknown, path: string): Directive {
  if (Array.isArray(value)) {
    return new Directive({sources: stringList(value, path)})
  }
  if (!isRecord(value)) {
    throw new PolicyConfigError(path, 'expected an object or an array of strings')
  }

  const directive = new Directive()
  if (value.keywords !== undefined) {
    const keywords = stringList(value.keywords, `${path}.keywords`)
    keywords.forEach((keyword, i) => {
      if (!isSourceFlag(keyword)) {
        throw new PolicyConfigError(
          `${path}.keywords[${i}]`,
          `unknown keyword "${keyword}"`,
        )
      }
      directive.allow(keyword)
    })
  }
  if (value.sources !== undefined) {
    directive.add(...stringList(value.sources, `${path}.sources`))
  }
  if (value.hashes !== undefined) {
    for (const {algorithm, content} of parseHashes(value.hashes, `${path}.hashes`)) {
      directive.hash(algorithm, content)
    }
  }
  if (optionalBoolean(value, 'all', `${path}.`)) directive.allowAll()
  if (optionalBoolean(value, 'none', `${path}.`)) directive.allowNone()
  return directive
}

/**
 * Validates a parsed JSON document and builds the Policy it describes.
 * The policy is returned unbuilt.
 * @throws PolicyConfigError naming the offending field
 */
export function policyFromConfig(config: unknown, logger?: Logger): Policy {
  if (!isRecord(config)) {
    throw new PolicyConfigError('', 'policy configuration must be an object')
  }

  const opts = {
    upgradeInsecureRequests: optionalBoolean(config, 'upgradeInsecureRequests', ''),
    reportUri: optionalString(config, 'reportUri', ''),
    noncePlaceholder: optionalString(config, 'noncePlaceholder', '') || undefined,
    logger,
  }
  const policy = optionalBoolean(config, 'starter', '')
    ? Policy.starter(opts)
    : new Policy(opts)

  const {directives} = config
  if (directives !== undefined) {
    if (!isRecord(directives)) {
      throw new PolicyConfigError('directives', 'expected an object')
    }
    for (const [name, value] of Object.entries(directives)) {
      policy.with(name, parseDirective(value, `directives.${name}`))
    }
  }
  return policy
}

/**
 * Reads and parses a JSON policy file.
 */
export function loadPolicyConfig(path: string, logger?: Logger): Policy {
  const text = readFileSync(path, 'utf8')
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new PolicyConfigError('', `${path} is not valid JSON`, {cause: err})
  }
  return policyFromConfig(parsed, logger)
}
