#!/usr/bin/env node

/**
 * @file cli.ts
 * @description Command-line interface: compiles a policy file into a header
 */

import type {CLIOptions} from './types'
import {parseArgs} from 'node:util'
import {loadPolicyConfig} from './config'
import {CSP_HEADER, CSP_REPORT_ONLY_HEADER} from './constants'
import {Policy} from './policy'

export function parsePresets(
  value: string | undefined,
): Record<string, readonly string[]> {
  if (!value) return {}
  const presets: Record<string, readonly string[]> = {}
  value.split(';').forEach((preset) => {
    const separator = preset.indexOf(':')
    if (separator === -1) return
    // Sources such as `https://cdn.example.com` or `data:` contain colons too
    const directive = preset.slice(0, separator).trim()
    const values = preset
      .slice(separator + 1)
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean)
    if (directive && values.length) {
      presets[directive] = Object.freeze(values)
    }
  })
  return presets
}

function isOutputFormat(value: string): value is CLIOptions['outputFormat'] {
  return value === 'header' || value === 'raw' || value === 'json'
}

export function formatOutput(
  csp: string,
  options: Pick<CLIOptions, 'outputFormat' | 'reportOnly'>,
  nonce = '',
): string {
  const header = options.reportOnly ? CSP_REPORT_ONLY_HEADER : CSP_HEADER
  switch (options.outputFormat) {
    case 'json':
      return JSON.stringify(
        nonce ? {[header]: csp, nonce} : {[header]: csp},
        null,
        2,
      )
    case 'raw':
      return csp
    case 'header':
    default:
      return `${header}: ${csp}`
  }
}

export function getOptions(argv: string[] = process.argv.slice(2)): CLIOptions {
  const {
    values: {
      config,
      presets,
      starter,
      'upgrade-insecure-requests': upgradeInsecureRequests,
      'report-uri': reportUri,
      'report-only': reportOnly,
      'nonce-placeholder': noncePlaceholder,
      'with-nonce': withNonce,
      format,
    },
    positionals,
  } = parseArgs({
    args: argv,
    options: {
      config: {type: 'string', short: 'c'},
      presets: {type: 'string'},
      starter: {type: 'string'},
      'upgrade-insecure-requests': {type: 'string'},
      'report-uri': {type: 'string'},
      'report-only': {type: 'string'},
      'nonce-placeholder': {type: 'string'},
      'with-nonce': {type: 'string'},
      format: {type: 'string', short: 'f'},
    },
    allowPositionals: true,
  })

  const env = process.env

  // Unset flags stay undefined so the policy file's own value survives
  const parseOptionalBoolean = (
    value: string | undefined,
    envVar: string | undefined,
  ) => {
    const val = value ?? envVar
    if (!val) return undefined
    return val === 'true'
  }

  const outputFormat = format || env.CSP_OUTPUT_FORMAT || 'header'

  return {
    configPath: positionals[0] || config || env.CSP_CONFIG || '',
    presets: parsePresets(presets || env.CSP_PRESETS),
    starter: parseOptionalBoolean(starter, env.CSP_STARTER),
    upgradeInsecureRequests: parseOptionalBoolean(
      upgradeInsecureRequests,
      env.CSP_UPGRADE_INSECURE_REQUESTS,
    ),
    reportUri: reportUri ?? (env.CSP_REPORT_URI || undefined),
    noncePlaceholder: noncePlaceholder || env.CSP_NONCE_PLACEHOLDER || undefined,
    reportOnly: parseOptionalBoolean(reportOnly, env.CSP_REPORT_ONLY) ?? false,
    withNonce: parseOptionalBoolean(withNonce, env.CSP_WITH_NONCE) ?? false,
    outputFormat: isOutputFormat(outputFormat) ? outputFormat : 'header',
  }
}

/**
 * Assembles the policy described by the options: the policy file (if any),
 * then the starter defaults, presets and global flags layered on top.
 */
export function createPolicy(options: CLIOptions): Policy {
  const {configPath, starter, upgradeInsecureRequests, reportUri, noncePlaceholder} =
    options

  let policy: Policy
  if (configPath) {
    const fromFile = loadPolicyConfig(configPath)
    if (noncePlaceholder && noncePlaceholder !== fromFile.noncePlaceholder) {
      throw new Error(
        '--nonce-placeholder cannot override the placeholder of a policy file',
      )
    }
    policy = fromFile
  } else {
    const opts = {noncePlaceholder}
    policy = starter ? Policy.starter(opts) : new Policy(opts)
  }

  if (configPath && starter) {
    const defaults = Policy.starter()
    for (const name of defaults.names()) {
      const directive = defaults.get(name)
      if (directive && !policy.has(name)) policy.with(name, directive)
    }
  }

  for (const [name, sources] of Object.entries(options.presets)) {
    policy.directive(name, ...sources)
  }

  if (upgradeInsecureRequests !== undefined) {
    policy.upgradeInsecureRequests = upgradeInsecureRequests
  }
  if (reportUri !== undefined) {
    policy.reportUri = reportUri
  }
  return policy
}

export function printUsage(): void {
  console.error('Usage: csp-builder [policy.json] [options]')
  console.error('\nOptions:')
  console.error('  --config, -c <path>            JSON policy file')
  console.error(
    '  --presets <presets>            Directive sources, e.g. "script-src:\'self\',cdn.example.com"',
  )
  console.error('  --starter <true|false>         Seed with restrictive defaults')
  console.error(
    '  --upgrade-insecure-requests <true|false>  Append upgrade-insecure-requests',
  )
  console.error('  --report-uri <uri>             Append report-uri <uri>')
  console.error(
    '  --report-only <true|false>     Name the header Content-Security-Policy-Report-Only',
  )
  console.error('  --nonce-placeholder <token>    Placeholder left for the nonce')
  console.error('  --with-nonce <true|false>      Substitute a freshly generated nonce')
  console.error(
    '  --format, -f <format>          Output format (header, raw, json)',
  )
  console.error('\nExample: csp-builder policy.json --format json')
}

export function main(argv: string[] = process.argv.slice(2)): void {
  let options: CLIOptions
  try {
    options = getOptions(argv)
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
    return
  }

  if (
    !options.configPath &&
    !options.starter &&
    !Object.keys(options.presets).length
  ) {
    printUsage()
    process.exit(1)
    return
  }

  try {
    const policy = createPolicy(options)
    policy.build()

    if (options.withNonce) {
      const {header, nonce} = policy.withNonce()
      console.log(formatOutput(header, options, nonce))
    } else {
      console.log(formatOutput(policy.compiled, options))
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

// Only run main() if this is the main module
if (require.main === module) {
  main()
}
