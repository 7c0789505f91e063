import 'dotenv/config'
import { eq } from 'drizzle-orm'
import { DEFAULT_BRANCH_CODE } from '@shiftdesk/schema'
import {
  branches,
  createDatabase,
  createPool,
  loadDatabaseConfig,
  seedDefaultConstraints,
  staff,
} from '../src/index'

/** Demo roster for local development; only written when MAIN has no staff. */
const DEMO_STAFF = [
  { name: 'Sato', gender: 'F', role: 'manager', skills: 'NIGHT,L1', displayOrder: 1 },
  { name: 'Suzuki', gender: 'M', role: 'staff', skills: 'NIGHT', displayOrder: 2 },
  { name: 'Takahashi', gender: 'F', role: 'staff', skills: 'L1', displayOrder: 3 },
  { name: 'Tanaka', gender: 'M', role: 'staff', skills: '', displayOrder: 4 },
] as const

async function seed() {
  const pool = createPool(loadDatabaseConfig(process.env))
  const db = createDatabase(pool)

  try {
    // Every branch without rules gets the default catalog.
    const allBranches = await db.select().from(branches)
    for (const branch of allBranches) {
      const inserted = await seedDefaultConstraints(db, branch.id)
      console.log(`${branch.code}: ${inserted > 0 ? `seeded ${inserted} constraints` : 'constraints already present'}`)
    }

    const main = allBranches.find((branch) => branch.code === DEFAULT_BRANCH_CODE)
    if (!main) {
      console.log('MAIN branch not found; run db:migrate first.')
      return
    }

    const existingStaff = await db.select({ id: staff.id }).from(staff).where(eq(staff.branchId, main.id)).limit(1)
    if (existingStaff.length === 0) {
      await db.insert(staff).values(DEMO_STAFF.map((member) => ({ ...member, branchId: main.id })))
      console.log(`MAIN: added ${DEMO_STAFF.length} demo staff`)
    }
  } finally {
    await pool.end()
  }
}

seed().catch((error) => {
  console.error('Seed failed:', error)
  process.exit(1)
})
