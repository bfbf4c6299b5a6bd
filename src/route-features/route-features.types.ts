export type RouteDescriptor = {
  name?: string
  grade?: string
  crag?: string
  angles?: string[] // "overhanging", "roof", "slab", "vertical"
  lengths?: string[] // "long", "short", "bouldery"
  holdTypes?: string[] // "crimpy", "slopers", "pockets", "pinches", "crack"
  description?: string
  style?: string // single user-selected style
}

export type RouteFlag =
  | 'isSteep'
  | 'isTechnical'
  | 'isEndurance'
  | 'isPower'
  | 'isCrimpy'
  | 'isSlopey'
  | 'isPockety'
  | 'isPumpy'
  | 'isSustained'
  | 'isBouldery'
  | 'isDynamic'

export type RouteFlags = Record<RouteFlag, boolean>

export type RouteFeatures = RouteFlags & {
  primaryStyle: string
  keyChallenges: string[]
  grade: string
}
