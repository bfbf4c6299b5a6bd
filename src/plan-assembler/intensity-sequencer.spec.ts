import { readFileSync } from 'fs'
import { join } from 'path'
import { parseExerciseCatalog } from '../exercise-catalog/exercise-catalog.service'
import { IntensitySequencer, loadIntensityRanks } from './intensity-sequencer'

const configDir = join(__dirname, '..', '..', 'config')

describe('IntensitySequencer', () => {
  const sequencer = new IntensitySequencer({ defaultRank: 99, ranks: { Campus: 10, Plank: 80, 'Warm-up': 0 } })

  it('puts the more intense exercise first', () => {
    expect(sequencer.order(['Plank', 'Campus'], (n) => n)).toEqual(['Campus', 'Plank'])
  })

  it('sorts unknown names last and keeps their order', () => {
    expect(sequencer.order(['Mystery B', 'Plank', 'Mystery A', 'Warm-up'], (n) => n)).toEqual([
      'Warm-up',
      'Plank',
      'Mystery B',
      'Mystery A',
    ])
    expect(sequencer.rankOf('Mystery A')).toBe(99)
  })

  it('ranks every catalog exercise in the shipped table', () => {
    const table = loadIntensityRanks(join(configDir, 'intensity-ranks.json'))
    const catalog = parseExerciseCatalog(readFileSync(join(configDir, 'exercise-catalog.json'), 'utf8'))

    const unranked = catalog.map((e) => e.name).filter((name) => table.ranks[name] === undefined)
    expect(unranked).toEqual([])
  })

  it('keeps warm-ups ahead of cool-downs in the shipped table', () => {
    const shipped = new IntensitySequencer(loadIntensityRanks(join(configDir, 'intensity-ranks.json')))
    expect(
      shipped.order(['Light Stretching', 'Route 4x4s', 'Max Boulder Sessions', 'General Warm-up'], (n) => n),
    ).toEqual(['General Warm-up', 'Max Boulder Sessions', 'Route 4x4s', 'Light Stretching'])
  })

  it('rejects a missing table file', () => {
    expect(() => loadIntensityRanks(join(configDir, 'missing.json'))).toThrow('Intensity ranks not found')
  })
})
