import { and, eq } from 'drizzle-orm'
import { userBranches, type Database } from '@shiftdesk/db'
import type { BranchRole } from '@shiftdesk/schema'

/**
 * Branch access policy.
 *
 * Row level security is switched on in the database but no policies are
 * defined there; this module is where per-row access is decided. Every
 * branch-scoped route evaluates it with (user, branch, permission) before it
 * touches data.
 */

export const BRANCH_PERMISSIONS = [
  'branch.read',
  'branch.update',
  'members.read',
  'members.manage',
  'staff.read',
  'staff.write',
  'staff.delete',
  'shifts.read',
  'shifts.write',
  'swaps.read',
  'swaps.create',
  'swaps.review',
  'constraints.read',
  'constraints.tune',
  'constraints.manage',
  'notifications.read',
  'notifications.create',
] as const

export type BranchPermission = (typeof BRANCH_PERMISSIONS)[number]

const VIEWER_PERMISSIONS: BranchPermission[] = [
  'branch.read',
  'staff.read',
  'shifts.read',
  'swaps.read',
  'swaps.create',
  'constraints.read',
  'notifications.read',
]

/**
 * Role bundles. `super` holds everything inside its own branch; creating and
 * hard-deleting branches is reserved for platform admins.
 */
const ROLE_PERMISSIONS: Record<BranchRole, readonly (BranchPermission | '*')[]> = {
  super: ['*'],
  editor: [
    ...VIEWER_PERMISSIONS,
    'members.read',
    'staff.write',
    'shifts.write',
    'swaps.review',
    'constraints.tune',
    'notifications.create',
  ],
  viewer: VIEWER_PERMISSIONS,
}

export type AccessUser = {
  id: string
  isPlatformAdmin: boolean
}

export type PermissionDecision = {
  allowed: boolean
  reason: string
  scope: 'platform' | 'branch'
  role?: BranchRole
}

export function roleHasPermission(role: BranchRole, permission: BranchPermission): boolean {
  // The column is plain text; a role written by another tool grants nothing.
  const granted: readonly (BranchPermission | '*')[] | undefined = ROLE_PERMISSIONS[role]
  if (!granted) return false
  return granted.includes('*') || granted.includes(permission)
}

export class BranchAccessPolicy {
  constructor(private readonly db: Database) {}

  async evaluate(user: AccessUser, branchId: string, permission: BranchPermission): Promise<PermissionDecision> {
    if (user.isPlatformAdmin) {
      return { allowed: true, reason: 'platform admin bypass', scope: 'platform' }
    }

    const [membership] = await this.db
      .select({ role: userBranches.role })
      .from(userBranches)
      .where(and(eq(userBranches.userId, user.id), eq(userBranches.branchId, branchId)))
      .limit(1)

    if (!membership) {
      return { allowed: false, reason: 'not a member of this branch', scope: 'branch' }
    }

    if (!roleHasPermission(membership.role, permission)) {
      return {
        allowed: false,
        reason: `role "${membership.role}" lacks ${permission}`,
        scope: 'branch',
        role: membership.role,
      }
    }

    return { allowed: true, reason: `granted by role "${membership.role}"`, scope: 'branch', role: membership.role }
  }
}
