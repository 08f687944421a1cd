/**
 * Run-scoped dedup ledger.
 * Scope is the region, so an item listed in two overlapping zones of one
 * region is credited once. One ledger per run; persistence uniqueness on
 * hotel_id is the second line of defense.
 */

export class DedupLedger {
  private readonly scopes = new Map<string, Set<string>>();

  /** Records `identifier` on first sight within `scope`; false thereafter. */
  accept(scope: string, identifier: string): boolean {
    let ids = this.scopes.get(scope);
    if (!ids) {
      ids = new Set();
      this.scopes.set(scope, ids);
    }
    if (ids.has(identifier)) return false;
    ids.add(identifier);
    return true;
  }

  seen(scope: string): ReadonlySet<string> {
    return this.scopes.get(scope) ?? new Set();
  }

  size(scope?: string): number {
    if (scope !== undefined) return this.scopes.get(scope)?.size ?? 0;
    let total = 0;
    for (const ids of this.scopes.values()) total += ids.size;
    return total;
  }

  /** Seeds a scope with identifiers accepted by an earlier run. */
  seed(scope: string, identifiers: Iterable<string>): void {
    for (const id of identifiers) this.accept(scope, id);
  }
}
