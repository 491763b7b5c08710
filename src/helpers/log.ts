import { grey, red, yellow } from 'kleur/colors'

export interface Logger {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

/**
 * Console logger. Debug lines only show up when `verbose` is set.
 */
export function createLogger(verbose = false): Logger {
  return {
    debug(message) {
      if (verbose)
        console.log(grey(message))
    },
    info(message) {
      console.log(message)
    },
    warn(message) {
      console.warn(yellow(message))
    },
    error(message) {
      console.error(red(message))
    },
  }
}
