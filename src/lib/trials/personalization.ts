/**
 * Viewer-scoped "is saved" annotation. Read-only: nothing here writes.
 */

export type SavedFlagProjection =
  | { kind: 'viewer-saved'; viewerId: string }
  | { kind: 'constant-false' };

export interface SavedLookup {
  isSaved(viewerId: string, trialId: string): Promise<boolean>;
}

/**
 * Column projected into list queries. Anonymous viewers get a constant
 * false so the field is always present.
 */
export function savedFlagProjection(viewerId: string | null): SavedFlagProjection {
  return viewerId ? { kind: 'viewer-saved', viewerId } : { kind: 'constant-false' };
}

/**
 * Saved flag for a single trial; anonymous viewers never hit storage.
 */
export async function resolveIsSaved(
  lookup: SavedLookup,
  viewerId: string | null,
  trialId: string
): Promise<boolean> {
  if (!viewerId) {
    return false;
  }
  return lookup.isSaved(viewerId, trialId);
}
