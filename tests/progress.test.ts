import { describe, expect, it, vi } from 'vitest'
import { createProgressBar } from '../src/helpers/progress'

const progressMocks = vi.hoisted(() => {
  const start = vi.fn()
  const increment = vi.fn()
  const stop = vi.fn()
  const singleBar = vi.fn().mockImplementation(function () {
    return { start, increment, stop }
  })
  return { start, increment, stop, singleBar }
})

vi.mock('cli-progress', () => ({
  default: {
    SingleBar: progressMocks.singleBar,
    Presets: { shades_classic: 'preset' },
  },
}))

describe('helpers/progress', () => {
  it('creates and starts a progress bar', () => {
    createProgressBar(10, 'Label')

    expect(progressMocks.singleBar).toHaveBeenCalledTimes(1)
    expect(progressMocks.singleBar.mock.calls[0][1]).toBe('preset')
    expect(progressMocks.start).toHaveBeenCalledWith(10, 0, { filename: '' })
  })

  it('ticks with the file name and stops', () => {
    const bar = createProgressBar(2, 'Label')

    bar.tick('/photos/in/photo1.jpg')
    bar.stop()

    expect(progressMocks.increment).toHaveBeenCalledWith(1, { filename: '→ photo1.jpg' })
    expect(progressMocks.stop).toHaveBeenCalledTimes(1)
  })
})
