// ============================================
// Seed Outcome
// ============================================

/** Step of the seeding task that failed */
export type SeedStage = 'read_flag' | 'seed_write' | 'flag_write' | 'unexpected'

/** Result of one run of the data seeding task */
export type SeedOutcome =
  | { readonly _tag: 'Seeded'; readonly count: number }
  | { readonly _tag: 'AlreadySeeded' }
  | { readonly _tag: 'Failed'; readonly stage: SeedStage; readonly message: string }

export const SeedOutcome = {
  seeded: (count: number): SeedOutcome => ({ _tag: 'Seeded', count }),
  alreadySeeded: (): SeedOutcome => ({ _tag: 'AlreadySeeded' }),
  failed: (stage: SeedStage, message: string): SeedOutcome => ({ _tag: 'Failed', stage, message }),
} as const

/** What both startup tasks ended with */
export interface BootstrapReport {
  /** Value the log subsystem was initialized with */
  readonly fileLoggingEnabled: boolean
  readonly seed: SeedOutcome
}
