import { ulid } from 'ulid';

/**
 * New ID for one occupancy of the current-rapp slot. ULIDs sort by creation time.
 */
export function generateRunID(): string {
  return ulid();
}
