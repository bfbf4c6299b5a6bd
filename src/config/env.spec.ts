import { readIntEnv, readNumberEnv, readStringEnv } from './env'

describe('env readers', () => {
  it('falls back on missing, blank or non-numeric values', () => {
    expect(readIntEnv({}, 'X', 3)).toBe(3)
    expect(readIntEnv({ X: '  ' }, 'X', 3)).toBe(3)
    expect(readIntEnv({ X: 'many' }, 'X', 3)).toBe(3)
  })

  it('floors and clamps integers', () => {
    expect(readIntEnv({ X: '4.9' }, 'X', 3)).toBe(4)
    expect(readIntEnv({ X: '12' }, 'X', 3, { min: 1, max: 5 })).toBe(5)
    expect(readIntEnv({ X: '-2' }, 'X', 3, { min: 1 })).toBe(1)
  })

  it('keeps fractions for numbers', () => {
    expect(readNumberEnv({ X: '0.35' }, 'X', 0.4, { min: 0, max: 2 })).toBe(0.35)
  })

  it('trims strings and treats blank as missing', () => {
    expect(readStringEnv({ X: ' gpt-4o-mini ' }, 'X')).toBe('gpt-4o-mini')
    expect(readStringEnv({ X: '' }, 'X')).toBeUndefined()
  })
})
