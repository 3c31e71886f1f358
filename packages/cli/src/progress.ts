import chalk from 'chalk'
import type { AuthStage, ProgressReporter } from '@nlm-auth/core'

export interface TextSink {
  write(chunk: string): unknown
}

const STAGE_MESSAGES: Record<AuthStage, (detail?: string) => string> = {
  locating: () => 'Locating Chrome profile...',
  cloning: (detail) => `Copying profile data${detail ? ` from ${detail}` : ''}...`,
  launching: () => 'Launching browser...',
  navigating: (detail) => `Opening ${detail ?? 'NotebookLM'}...`,
  waiting: () => 'Waiting for sign-in',
  closing: () => 'Closing browser...',
}

/**
 * Stage lines and a rotating `.` / `..` / `...` indicator while waiting.
 * Writes to stderr; stdout carries the credentials.
 */
export function createCliProgress(sink: TextSink = process.stderr): ProgressReporter {
  let waitingLine = false

  const endWaitingLine = () => {
    if (waitingLine) {
      sink.write('\n')
      waitingLine = false
    }
  }

  return {
    stage(stage, detail) {
      endWaitingLine()
      if (stage === 'waiting') {
        sink.write(`${chalk.cyan('›')} ${STAGE_MESSAGES.waiting()}`)
        waitingLine = true
        return
      }
      sink.write(`${chalk.cyan('›')} ${STAGE_MESSAGES[stage](detail)}\n`)
    },
    waiting(tick) {
      const dots = '.'.repeat(((tick - 1) % 3) + 1).padEnd(3)
      sink.write(`\r${chalk.cyan('›')} ${STAGE_MESSAGES.waiting()}${dots}`)
      waitingLine = true
    },
  }
}
