import { UnresolvedExerciseNameError } from '../errors/plan-generation.errors'
import { nameSimilarity, repairFocus, resolveExerciseName, splitFocus } from './vocabulary-repair'

const names = ['Boulder 4x4s', 'Route 4x4s', 'Plank', 'Max Boulder Sessions']

describe('vocabulary repair', () => {
  it('measures similarity on lower-cased names', () => {
    expect(nameSimilarity('Plank', 'plank')).toBe(1)
    expect(nameSimilarity('Boulder 4x4', 'Boulder 4x4s')).toBeCloseTo(11 / 12, 10)
  })

  it('splits focus on the combinator and trims tokens', () => {
    expect(splitFocus(' Plank +Route 4x4s + ')).toEqual(['Plank', 'Route 4x4s'])
  })

  it('keeps exact names and rewrites a near miss', () => {
    expect(resolveExerciseName('Plank', names)).toEqual({ name: 'Plank', similarity: 1 })
    expect(resolveExerciseName('Boulder 4x4', names).name).toBe('Boulder 4x4s')
  })

  it('raises for a token below the cutoff', () => {
    let caught: unknown
    try {
      resolveExerciseName('Yoga Flow', names)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(UnresolvedExerciseNameError)
  })

  it('substitutes, drops and de-duplicates without throwing', () => {
    const out = repairFocus('Boulder 4x4 + Yoga Flow + Plank + plank', names)

    expect(out.names).toEqual(['Boulder 4x4s', 'Plank'])
    expect(out.repairs).toHaveLength(3)
    expect(out.repairs[0]).toEqual({
      kind: 'substituted',
      token: 'Boulder 4x4',
      replacement: 'Boulder 4x4s',
      similarity: 11 / 12,
    })
    expect(out.repairs[1]).toMatchObject({ kind: 'dropped', token: 'Yoga Flow' })
    expect(out.repairs[2]).toEqual({ kind: 'substituted', token: 'plank', replacement: 'Plank', similarity: 1 })
  })

  it('returns no names when nothing resolves', () => {
    expect(repairFocus('Yoga Flow', names).names).toEqual([])
  })
})
