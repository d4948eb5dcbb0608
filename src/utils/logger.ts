import * as core from '@actions/core'

/**
 * Thin wrapper over the Actions toolkit so every module logs the same way,
 * whether it runs inside a workflow or from a shell.
 */
export const logger = {
  debug(message: string): void {
    core.debug(message)
  },

  info(message: string): void {
    core.info(message)
  },

  warning(message: string | Error): void {
    core.warning(message)
  },

  error(message: string | Error): void {
    core.error(message)
  },

  async group<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return await core.group(name, fn)
  }
}
