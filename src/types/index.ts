/**
 * Shared Types
 */

export type { CommandRepr, CommandResult } from './command'
