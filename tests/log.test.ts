import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from '../src/helpers/log'

vi.mock('kleur/colors', () => ({
  grey: (s: string) => `grey(${s})`,
  red: (s: string) => `red(${s})`,
  yellow: (s: string) => `yellow(${s})`,
}))

describe('helpers/log', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('hides debug lines unless verbose', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})

    createLogger(false).debug('hidden')
    createLogger(true).debug('shown')

    expect(logSpy).toHaveBeenCalledTimes(1)
    expect(logSpy).toHaveBeenCalledWith('grey(shown)')
  })

  it('routes levels to the matching console method', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const log = createLogger()

    log.info('info')
    log.warn('careful')
    log.error('broken')

    expect(logSpy).toHaveBeenCalledWith('info')
    expect(warnSpy).toHaveBeenCalledWith('yellow(careful)')
    expect(errSpy).toHaveBeenCalledWith('red(broken)')
  })
})
