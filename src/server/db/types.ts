export type RunResult = { changes: number }

/** Rows come back untyped; stores narrow them with their own row guards. */
export type Statement = {
  run: (...params: unknown[]) => RunResult
  get: (...params: unknown[]) => unknown
  all: (...params: unknown[]) => unknown[]
}

/** The subset of better-sqlite3's Database the migrations and stores touch. */
export type Database = {
  exec: (sql: string) => void
  prepare: (sql: string) => Statement
  pragma: (pragma: string) => unknown
  transaction: <T>(fn: () => T) => () => T
  close: () => void
}
