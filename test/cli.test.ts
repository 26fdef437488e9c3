import {join} from 'path'
import {afterEach, beforeEach, describe, expect, test, vi} from 'vitest'
import {
  createPolicy,
  formatOutput,
  getOptions,
  main,
  parsePresets,
} from '../src/cli'

const fixture = (name: string) => join(__dirname, 'fixtures', name)

const SHA512_DO_SOMETHING =
  "'sha512-NrS2FABurNzIW2yTKRxF8X+HMhJh29vd9syOLut1MW4Cd1JeGzZqughLzC+LQr0O8XFhCuR4zyjLgrTQct7jAA=='"

const FIXTURE_POLICY =
  "default-src 'none';frame-ancestors *;img-src 'self' data:;" +
  `script-src $NONCE 'self' cdn.example.com ${SHA512_DO_SOMETHING};` +
  'upgrade-insecure-requests;report-uri /_csp-report'

describe('CLI', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  describe('parsePresets', () => {
    test('should parse presets string correctly', () => {
      const presets = "script-src:https://cdn.example.com,'self';img-src:data:"
      expect(parsePresets(presets)).toEqual({
        'script-src': ['https://cdn.example.com', "'self'"],
        'img-src': ['data:'],
      })
    })

    test('should handle empty presets', () => {
      expect(parsePresets(undefined)).toEqual({})
    })

    test('should handle malformed presets', () => {
      expect(parsePresets('script-src;style-src:')).toEqual({})
    })

    test('should accept experimental directive names', () => {
      expect(parsePresets('fenced-frame-src:frames.example.com')).toEqual({
        'fenced-frame-src': ['frames.example.com'],
      })
    })

    test('should trim whitespace from values', () => {
      const presets = 'script-src: example.com , cdn.com ; style-src: styles.com '
      expect(parsePresets(presets)).toEqual({
        'script-src': ['example.com', 'cdn.com'],
        'style-src': ['styles.com'],
      })
    })
  })

  describe('formatOutput', () => {
    const csp = "default-src 'self';object-src 'none'"

    test('should format as header', () => {
      expect(formatOutput(csp, {outputFormat: 'header', reportOnly: false})).toBe(
        "Content-Security-Policy: default-src 'self';object-src 'none'",
      )
    })

    test('should name the report-only header', () => {
      expect(formatOutput(csp, {outputFormat: 'header', reportOnly: true})).toBe(
        "Content-Security-Policy-Report-Only: default-src 'self';object-src 'none'",
      )
    })

    test('should format as raw', () => {
      expect(formatOutput(csp, {outputFormat: 'raw', reportOnly: false})).toBe(csp)
    })

    test('should format as JSON with the nonce when one was issued', () => {
      expect(
        formatOutput(csp, {outputFormat: 'json', reportOnly: false}, 'abc'),
      ).toBe(
        JSON.stringify(
          {'Content-Security-Policy': csp, nonce: 'abc'},
          null,
          2,
        ),
      )
      expect(formatOutput(csp, {outputFormat: 'json', reportOnly: false})).toBe(
        JSON.stringify({'Content-Security-Policy': csp}, null, 2),
      )
    })
  })

  describe('getOptions', () => {
    test('should read flags', () => {
      const options = getOptions([
        'policy.json',
        '--presets',
        'script-src:cdn.example.com',
        '--starter',
        'true',
        '--upgrade-insecure-requests',
        'false',
        '--report-uri',
        '/_csp-report',
        '--report-only',
        'true',
        '--nonce-placeholder',
        '{{nonce}}',
        '--with-nonce',
        'true',
        '-f',
        'json',
      ])
      expect(options).toEqual({
        configPath: 'policy.json',
        presets: {'script-src': ['cdn.example.com']},
        starter: true,
        upgradeInsecureRequests: false,
        reportUri: '/_csp-report',
        noncePlaceholder: '{{nonce}}',
        reportOnly: true,
        withNonce: true,
        outputFormat: 'json',
      })
    })

    test('should use environment variables when no flags are given', () => {
      vi.stubEnv('CSP_CONFIG', 'env-policy.json')
      vi.stubEnv('CSP_PRESETS', 'img-src:data:')
      vi.stubEnv('CSP_REPORT_URI', '/env-report')
      vi.stubEnv('CSP_REPORT_ONLY', 'true')
      vi.stubEnv('CSP_OUTPUT_FORMAT', 'raw')

      const options = getOptions([])
      expect(options.configPath).toBe('env-policy.json')
      expect(options.presets).toEqual({'img-src': ['data:']})
      expect(options.reportUri).toBe('/env-report')
      expect(options.reportOnly).toBe(true)
      expect(options.outputFormat).toBe('raw')
    })

    test('should prioritize flags over environment variables', () => {
      vi.stubEnv('CSP_CONFIG', 'env-policy.json')
      vi.stubEnv('CSP_REPORT_ONLY', 'true')

      const options = getOptions(['--config', 'cli-policy.json', '--report-only', 'false'])
      expect(options.configPath).toBe('cli-policy.json')
      expect(options.reportOnly).toBe(false)
    })

    test('should leave unset policy flags undefined', () => {
      vi.stubEnv('CSP_STARTER', '')
      vi.stubEnv('CSP_UPGRADE_INSECURE_REQUESTS', '')
      vi.stubEnv('CSP_REPORT_URI', '')

      const options = getOptions([])
      expect(options.starter).toBeUndefined()
      expect(options.upgradeInsecureRequests).toBeUndefined()
      expect(options.reportUri).toBeUndefined()
    })

    test('should fall back to header for unknown formats', () => {
      expect(getOptions(['--format', 'yaml']).outputFormat).toBe('header')
    })
  })

  describe('createPolicy', () => {
    test('should load the policy file', () => {
      const policy = createPolicy(getOptions([fixture('policy.json')]))
      expect(policy.build()).toBe(FIXTURE_POLICY)
    })

    test('should let flags override the policy file', () => {
      const policy = createPolicy(
        getOptions([
          fixture('policy.json'),
          '--report-uri',
          '/other',
          '--upgrade-insecure-requests',
          'false',
          '--presets',
          "img-src:'self'",
        ]),
      )
      expect(policy.build()).toBe(
        "default-src 'none';frame-ancestors *;img-src 'self';" +
          `script-src $NONCE 'self' cdn.example.com ${SHA512_DO_SOMETHING};` +
          'report-uri /other',
      )
    })

    test('should fill missing directives with starter defaults', () => {
      const policy = createPolicy(
        getOptions([fixture('policy.json'), '--starter', 'true']),
      )
      expect(policy.names()).toEqual([
        'default-src',
        'base-uri',
        'connect-src',
        'form-action',
        'frame-ancestors',
        'img-src',
        'script-src',
        'style-src',
      ])
      expect(policy.get('img-src')?.render()).toBe("'self' data:")
    })

    test('should build from starter defaults and presets alone', () => {
      const policy = createPolicy(
        getOptions(['--starter', 'true', '--presets', 'script-src:cdn.example.com']),
      )
      expect(policy.build()).toBe(
        "default-src 'none';base-uri 'self';connect-src 'self';" +
          "form-action 'self';img-src 'self';script-src cdn.example.com;style-src 'self'",
      )
    })

    test('should refuse to change the placeholder of a policy file', () => {
      expect(() =>
        createPolicy(
          getOptions([fixture('policy.json'), '--nonce-placeholder', '{{nonce}}']),
        ),
      ).toThrow('--nonce-placeholder cannot override the placeholder of a policy file')
    })
  })

  describe('main', () => {
    const logSpy = () => vi.mocked(console.log)
    const errorSpy = () => vi.mocked(console.error)

    beforeEach(() => {
      vi.stubEnv('CSP_CONFIG', '')
      vi.stubEnv('CSP_PRESETS', '')
      vi.stubEnv('CSP_STARTER', '')
      vi.spyOn(console, 'log').mockImplementation(() => {})
      vi.spyOn(console, 'error').mockImplementation(() => {})
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${code})`)
      })
    })

    test('should print usage and exit when nothing is configured', () => {
      expect(() => main([])).toThrow('process.exit(1)')
      expect(errorSpy()).toHaveBeenCalledTimes(12)
      expect(errorSpy()).toHaveBeenCalledWith(
        'Usage: csp-builder [policy.json] [options]',
      )
    })

    test('should print the compiled policy', () => {
      main([fixture('policy.json'), '--format', 'raw'])
      expect(logSpy()).toHaveBeenCalledTimes(1)
      expect(logSpy()).toHaveBeenCalledWith(FIXTURE_POLICY)
    })

    test('should print the header line by default', () => {
      main(['--starter', 'true', '--report-only', 'true'])
      expect(logSpy()).toHaveBeenCalledWith(
        "Content-Security-Policy-Report-Only: default-src 'none';base-uri 'self';" +
          "connect-src 'self';form-action 'self';img-src 'self';script-src 'self';style-src 'self'",
      )
    })

    test('should substitute a nonce when asked', () => {
      main([fixture('policy.json'), '--with-nonce', 'true', '--format', 'json'])
      expect(logSpy()).toHaveBeenCalledTimes(1)

      const printed: unknown = JSON.parse(String(logSpy().mock.calls[0]?.[0]))
      expect(printed).toEqual({
        'Content-Security-Policy': expect.stringContaining("script-src 'nonce-"),
        nonce: expect.stringMatching(/^[A-Za-z0-9_-]{22}$/),
      })
    })

    test('should substitute a nonce for a placeholder given in presets', () => {
      main(['--presets', "script-src:'self',$NONCE", '--with-nonce', 'true', '-f', 'raw'])
      expect(logSpy()).toHaveBeenCalledTimes(1)

      const printed = String(logSpy().mock.calls[0]?.[0])
      expect(printed).toMatch(/^script-src 'self' 'nonce-[A-Za-z0-9_-]{22}'$/)
    })

    test('should report a missing policy file', () => {
      expect(() => main([fixture('missing.json')])).toThrow('process.exit(1)')
      expect(errorSpy()).toHaveBeenCalledWith(
        'Error:',
        expect.stringContaining('ENOENT'),
      )
    })

    test('should report configuration errors', () => {
      expect(() => main([fixture('invalid-hash.json')])).toThrow('process.exit(1)')
      expect(errorSpy()).toHaveBeenCalledWith(
        'Error:',
        'directives.script-src.hashes[0].algorithm: expected 256, 384 or 512',
      )
    })

    test('should report unknown flags', () => {
      expect(() => main(['--allow-everything'])).toThrow('process.exit(1)')
      expect(errorSpy()).toHaveBeenCalledWith('Error:', expect.stringContaining('--allow-everything'))
    })
  })
})
