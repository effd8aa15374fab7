import fs from 'node:fs/promises'
import { log } from './utils/logger'

/**
 * Observer for batch runs. `task` is the strategy name; `onComplete`
 * receives the batch's records.
 */
export interface ProgressCallback {
  onStart(task: string, total: number): Promise<void> | void
  onProgress(message: string, percent: number): Promise<void> | void
  onComplete(task: string, data: unknown): Promise<void> | void
  onInfo(message: string): Promise<void> | void
  onWarning(message: string): Promise<void> | void
  onError(message: string, error?: Error): Promise<void> | void
}

/**
 * Factory function to create a silent callback that does nothing
 * @returns ProgressCallback that ignores all events
 */
export function createSilentCallback(): ProgressCallback {
  return {
    onStart: () => {},
    onProgress: () => {},
    onComplete: () => {},
    onInfo: () => {},
    onWarning: () => {},
    onError: () => {},
  }
}

function countRecords(data: unknown): number {
  return Array.isArray(data) ? data.length : 0
}

function clearLine(): void {
  if (process.stdout.isTTY) {
    process.stdout.write('\r\x1b[K')
  }
}

/**
 * Factory function to create a console callback that logs to stdout/stderr
 * @param verbose - Whether to show all progress updates or only milestones
 */
export function createConsoleCallback(
  verbose: boolean = true,
): ProgressCallback {
  return {
    onStart: (task, total) => {
      console.info(`Starting ${task} extraction: ${total} URLs`)
    },
    onProgress: (message, percent) => {
      if (verbose || percent % 20 === 0) {
        const barLength = 30
        const filled = Math.floor((barLength * percent) / 100)
        const bar = '█'.repeat(filled) + '░'.repeat(barLength - filled)
        const output = `\r[${bar}] ${percent}% - ${message}`

        if (process.stdout.isTTY) {
          process.stdout.write(output)
        } else {
          console.log(output.trim())
        }
      }
    },
    onComplete: (task, data) => {
      clearLine()
      console.info(`Completed ${task} extraction: ${countRecords(data)} records`)
    },
    onInfo: (message) => {
      clearLine()
      console.info(`[Info] ${message}`)
    },
    onWarning: (message) => {
      clearLine()
      console.warn(`[Warning] ${message}`)
    },
    onError: (message, error) => {
      clearLine()
      console.error(`Error: ${message}`, error?.message ?? '')
    },
  }
}

/**
 * Factory function to create a JSON log callback that appends one event per line
 * @param logFile - Path to the log file
 */
export function createJSONLogCallback(logFile: string): ProgressCallback {
  async function append(
    eventType: string,
    data: Record<string, unknown>,
  ): Promise<void> {
    const entry = {
      timestamp: new Date().toISOString(),
      event_type: eventType,
      ...data,
    }

    try {
      await fs.appendFile(logFile, `${JSON.stringify(entry)}\n`)
    } catch (e) {
      log.error(`Failed to write to log file: ${e}`)
    }
  }

  return {
    onStart: async (task, total) => {
      await append('start', { strategy: task, total })
    },
    onProgress: async (message, percent) => {
      await append('progress', { message, percent })
    },
    onComplete: async (task, data) => {
      await append('complete', { strategy: task, records: countRecords(data) })
    },
    onInfo: async (message) => {
      await append('info', { message })
    },
    onWarning: async (message) => {
      await append('warning', { message })
    },
    onError: async (message, error) => {
      await append('error', {
        error: message,
        error_type: error?.name ?? 'Error',
        details: error?.message,
      })
    },
  }
}

/**
 * Factory function to create a multi callback that forwards events to multiple callbacks
 */
export function createMultiCallback(
  ...callbacks: ProgressCallback[]
): ProgressCallback {
  return {
    onStart: async (task, total) => {
      await Promise.all(callbacks.map((c) => c.onStart(task, total)))
    },
    onProgress: async (message, percent) => {
      await Promise.all(callbacks.map((c) => c.onProgress(message, percent)))
    },
    onComplete: async (task, data) => {
      await Promise.all(callbacks.map((c) => c.onComplete(task, data)))
    },
    onInfo: async (message) => {
      await Promise.all(callbacks.map((c) => c.onInfo(message)))
    },
    onWarning: async (message) => {
      await Promise.all(callbacks.map((c) => c.onWarning(message)))
    },
    onError: async (message, error) => {
      await Promise.all(callbacks.map((c) => c.onError(message, error)))
    },
  }
}
