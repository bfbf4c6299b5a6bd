import type { ExerciseDetail } from './plan-assembler.types'

// Words that usually open the next exercise's part of a combined description.
export const SECTION_KEYWORDS: readonly string[] = [
  'fingerboard',
  'campus',
  'boulder',
  'core',
  'anaerobic',
  'repeater',
  'hang',
  'density',
]

// Paragraph lookup when the exercise name itself is not in the text.
const PARAGRAPH_HINTS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['fingerboard', ['hang', 'edge', 'seconds', 'rest', 'crimp', 'repeater']],
  ['core', ['lever', 'plank', 'leg raise', 'core']],
  ['boulder', ['problem', 'boulder', 'v-grade', 'limit']],
]

function wordIndex(haystack: string, needle: string, from: number): number {
  let idx = haystack.indexOf(needle, from)
  while (idx >= 0) {
    const before = idx === 0 ? '' : haystack.charAt(idx - 1)
    if (!/[a-z0-9]/.test(before)) return idx
    idx = haystack.indexOf(needle, idx + 1)
  }
  return -1
}

function cleanFragment(text: string): string {
  return text.replace(/^[\s:,;.\-]+/, '').replace(/[\s,;\-]+$/, '').trim()
}

/**
 * Text after the first mention of `name`, cut at the next section keyword or
 * the next combined exercise name, whichever comes first.
 */
export function extractExerciseDetails(name: string, details: string, otherNames: readonly string[] = []): string {
  const lower = details.toLowerCase()
  const nameLower = name.toLowerCase()

  const at = lower.indexOf(nameLower)
  if (at >= 0) {
    const start = at + nameLower.length
    let end = details.length
    for (const anchor of [...SECTION_KEYWORDS, ...otherNames.map((n) => n.toLowerCase())]) {
      if (anchor === nameLower) continue
      const idx = wordIndex(lower, anchor, start)
      if (idx >= 0) end = Math.min(end, idx)
    }
    const fragment = cleanFragment(details.slice(start, end))
    if (fragment.length > 0) return fragment
  }

  const paragraphs = details.split('\n')
  for (const [hint, words] of PARAGRAPH_HINTS) {
    if (!nameLower.includes(hint)) continue
    for (const word of words) {
      const para = paragraphs.find((p) => p.toLowerCase().includes(word))
      if (para && para.trim().length > 0) return para.trim()
    }
    break
  }

  return ''
}

/** One entry per name; names without their own fragment get the full text. */
export function decomposeDetails(names: readonly string[], details: string): ExerciseDetail[] {
  return names.map((name) => {
    const others = names.filter((n) => n !== name)
    const fragment = extractExerciseDetails(name, details, others)
    return { name, details: fragment || details }
  })
}
