import type { Database } from './types.ts'
import { MIGRATIONS, type Migration } from './schema.ts'

export function runMigrations(db: Database, migrations: Migration[] = MIGRATIONS): string[] {
  db.exec(
    `
CREATE TABLE IF NOT EXISTS schema_migrations (
  id TEXT PRIMARY KEY,
  appliedAt INTEGER NOT NULL
);
`.trim(),
  )

  const applied = new Set<string>()
  for (const row of db.prepare('SELECT id FROM schema_migrations').all()) {
    const id = row && typeof row === 'object' ? (row as { id?: unknown }).id : undefined
    if (typeof id === 'string') applied.add(id)
  }

  const newlyApplied: string[] = []
  for (const m of [...migrations].sort((a, b) => a.id.localeCompare(b.id))) {
    if (applied.has(m.id)) continue

    const tx = db.transaction(() => {
      db.exec(m.sql)
      db.prepare('INSERT INTO schema_migrations (id, appliedAt) VALUES (?, ?)').run(m.id, Date.now())
    })

    tx()
    newlyApplied.push(m.id)
  }

  return newlyApplied
}
