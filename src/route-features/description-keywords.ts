import type { RouteFlag } from './route-features.types'

export type KeywordRule = {
  flag: RouteFlag
  keywords: readonly string[]
  challenge: string
}

// Substring match against the lower-cased description; order decides challenge order.
export const DESCRIPTION_KEYWORDS: readonly KeywordRule[] = [
  {
    flag: 'isEndurance',
    keywords: ['sustained', 'stamina', 'endurance', 'pump', 'all-day', 'continuous', 'long sequences'],
    challenge: 'endurance',
  },
  {
    flag: 'isPower',
    keywords: ['powerful', 'dynamic', 'dyno', 'explosive', 'bouldery', 'hard move', 'max effort'],
    challenge: 'power',
  },
  {
    flag: 'isTechnical',
    keywords: ['technical', 'precise', 'balance', 'delicate', 'crux', 'sequenced moves', 'footwork', 'slab'],
    challenge: 'technical movement',
  },
  { flag: 'isCrimpy', keywords: ['crimp', 'edge', 'small holds', 'tiny crimps'], challenge: 'small holds' },
  { flag: 'isSlopey', keywords: ['sloper', 'round hold', 'sloppy', 'friction'], challenge: 'slopers' },
  {
    flag: 'isPockety',
    keywords: ['pocket', 'deep pocket', 'mono pocket', 'frankenjura', 'duo pocket', 'hole'],
    challenge: 'pockets',
  },
  { flag: 'isSteep', keywords: ['overhang', 'roof', 'roofy', 'steep'], challenge: 'steepness' },
  { flag: 'isPumpy', keywords: ['pumpy', 'pump fest', 'forearm burn'], challenge: 'pump management' },
  { flag: 'isSustained', keywords: ['sustained', 'no rests', 'relentless'], challenge: 'sustained climbing' },
  { flag: 'isDynamic', keywords: ['dynamic', 'dyno', 'deadpoint', 'jump'], challenge: 'dynamic moves' },
  { flag: 'isBouldery', keywords: ['bouldery', 'boulder problem', 'v-grade crux'], challenge: 'bouldery sequences' },
]

export type StyleRule = {
  flags: readonly RouteFlag[]
  challenge: string
}

export const STYLE_TOKENS: Readonly<Record<string, StyleRule>> = {
  bouldery: { flags: ['isBouldery', 'isPower'], challenge: 'bouldery sequences' },
  pumpy: { flags: ['isPumpy', 'isEndurance'], challenge: 'pump management' },
  sustained: { flags: ['isSustained', 'isEndurance'], challenge: 'sustained climbing' },
  technical: { flags: ['isTechnical'], challenge: 'technical movement' },
  powerful: { flags: ['isPower'], challenge: 'power' },
  dynamic: { flags: ['isDynamic', 'isPower'], challenge: 'dynamic moves' },
  crimpy: { flags: ['isCrimpy'], challenge: 'small holds' },
  endurance: { flags: ['isEndurance'], challenge: 'endurance' },
}
