/**
 * Shared value vocabularies.
 *
 * The database stores these as plain text columns; the lists below are the
 * values the API accepts and the types the rest of the code narrows to.
 */

/** Role a user holds inside one branch (`user_branches.role`). */
export const BRANCH_ROLES = ['super', 'editor', 'viewer'] as const
export type BranchRole = (typeof BRANCH_ROLES)[number]

export const CONSTRAINT_CATEGORIES = ['coverage', 'sequence', 'balance', 'preference', 'skill'] as const
export type ConstraintCategory = (typeof CONSTRAINT_CATEGORIES)[number]

/** Hard rules must hold in every valid schedule; soft rules are penalized. */
export const CONSTRAINT_TYPES = ['hard', 'soft'] as const
export type ConstraintType = (typeof CONSTRAINT_TYPES)[number]

/**
 * Known swap request states. The column itself is open text, so rows written
 * by other tools may carry values outside this list.
 */
export const SWAP_REQUEST_STATUSES = ['pending', 'approved', 'rejected'] as const
export type SwapRequestStatus = (typeof SWAP_REQUEST_STATUSES)[number]

export const NOTIFICATION_TYPES = ['info', 'success', 'warning', 'error', 'swap'] as const
export type NotificationType = (typeof NOTIFICATION_TYPES)[number]

export const STAFF_GENDERS = ['M', 'F'] as const
export const STAFF_ROLES = ['staff', 'manager'] as const

export const SUPPORTED_LANGUAGES = ['ja', 'ko', 'en'] as const
export type Language = (typeof SUPPORTED_LANGUAGES)[number]

/** Shift codes that count as a day off in a monthly grid. */
export const OFF_SHIFT_CODES = ['-', '公'] as const

export const DEFAULT_DAY_SHIFTS = ['E1', 'E2', 'G1', 'G1U', 'H1', 'H2', 'I1', 'I2', 'L1'] as const
export const DEFAULT_NIGHT_SHIFTS = ['Q1', 'X1', 'R1'] as const

export const SKILL_NIGHT = 'NIGHT'
export const SKILL_L1 = 'L1'

/** Code of the branch created by the multi-branch migration. */
export const DEFAULT_BRANCH_CODE = 'MAIN'
