export type AuthStage =
  | 'locating'
  | 'cloning'
  | 'launching'
  | 'navigating'
  | 'waiting'
  | 'closing'

/**
 * Receives user-facing progress of an extraction run
 */
export interface ProgressReporter {
  stage(stage: AuthStage, detail?: string): void
  /** Called once per poll tick while waiting for the session */
  waiting(tick: number): void
}

export const silentProgress: ProgressReporter = {
  stage: () => {},
  waiting: () => {},
}
