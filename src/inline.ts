/**
 * @file inline.ts
 * @description Hash sources for the inline scripts and styles of rendered HTML
 */

import * as cheerio from 'cheerio'
import {hashSource} from './hash'
import type {HashAlgorithm} from './types'

export interface InlineHashes {
  /** Hash sources of inline <script> elements, for script-src. */
  scripts: string[]
  /** Hash sources of <style> elements, for style-src. */
  styles: string[]
}

/**
 * Parses an HTML document and hashes the exact text of every non-empty
 * inline script (no src attribute) and style element. Hashes are
 * de-duplicated and kept in document order.
 */
export function hashInlineContent(
  html: string,
  algorithm: HashAlgorithm = 256,
): InlineHashes {
  const $ = cheerio.load(html)
  const scripts = new Set<string>()
  const styles = new Set<string>()

  $('script').each((_, el) => {
    if ($(el).attr('src') !== undefined) return
    const code = $(el).text()
    if (code) scripts.add(hashSource(algorithm, code))
  })

  $('style').each((_, el) => {
    const css = $(el).text()
    if (css) styles.add(hashSource(algorithm, css))
  })

  return {scripts: [...scripts], styles: [...styles]}
}
