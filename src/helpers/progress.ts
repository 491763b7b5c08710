import path from 'node:path'
import cliProgress from 'cli-progress'

export interface ProgressBar {
  tick: (file: string) => void
  stop: () => void
}

export function createProgressBar(total: number, label: string): ProgressBar {
  const bar = new cliProgress.SingleBar(
    {
      format: `${label} [{bar}] {percentage}% ({value}/{total}) {duration_formatted} {filename}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic,
  )

  bar.start(total, 0, { filename: '' })

  return {
    tick(file) {
      const name = path.basename(file)
      bar.increment(1, { filename: name ? `→ ${name}` : '' })
    },
    stop() {
      bar.stop()
    },
  }
}
