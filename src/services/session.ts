/**
 * Dialogue Session Store (in-memory, injectable)
 *
 * Holds the in-flight step of every multi-turn flow, keyed by
 * contributor id and flow kind. At most one session per key: starting a
 * flow again overwrites the previous one.
 *
 * Entries expire after an idle TTL. Expired entries read as absent and
 * are dropped on access or by sweep().
 *
 * Map operations never span an await. Commit steps take() the session
 * before calling the store and restore() it when the call fails, so two
 * racing callbacks cannot both commit the same entry.
 *
 * Flows that show a keyboard carry a nonce. Button tokens embed it, so a
 * tap on an older keyboard never resolves against a newer option list.
 */

export type ExpenseFlow =
  | { kind: "expense"; step: "awaiting_amount" }
  | {
      kind: "expense";
      step: "awaiting_category";
      amount: number;
      options: string[];
      nonce: string;
    };

export type AddCategoryFlow = { kind: "add_category"; step: "awaiting_name" };

export type DeleteCategoryFlow = {
  kind: "delete_category";
  step: "awaiting_selection";
  options: string[];
  nonce: string;
};

export type ClearExpensesFlow = { kind: "clear_expenses"; step: "awaiting_confirmation" };

export type Flow = ExpenseFlow | AddCategoryFlow | DeleteCategoryFlow | ClearExpensesFlow;

export type FlowKind = Flow["kind"];

export type FlowOf<K extends FlowKind> = Extract<Flow, { kind: K }>;

interface Entry {
  flow: Flow;
  expiresAt: number;
}

export interface SessionStoreOptions {
  ttlSeconds: number;
  now?: () => number;
}

export class SessionStore {
  private readonly entries = new Map<number, Map<FlowKind, Entry>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private nonceSeq: number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
    // Seeded from the clock so tokens from a previous process never match
    this.nonceSeq = Date.now();
  }

  /** Short token, unique within this process. */
  issueNonce(): string {
    return (this.nonceSeq++).toString(36);
  }

  get<K extends FlowKind>(contributorId: number, kind: K): FlowOf<K> | null {
    const entry = this.live(contributorId, kind);
    return entry ? narrow(entry.flow, kind) : null;
  }

  /** Overwrites any session of the same kind. */
  set(contributorId: number, flow: Flow, ttlSeconds?: number): void {
    let flows = this.entries.get(contributorId);
    if (!flows) {
      flows = new Map();
      this.entries.set(contributorId, flows);
    }
    const ttlMs = ttlSeconds === undefined ? this.ttlMs : ttlSeconds * 1000;
    flows.set(flow.kind, { flow, expiresAt: this.now() + ttlMs });
  }

  /** Atomic read-and-remove. */
  take<K extends FlowKind>(contributorId: number, kind: K): FlowOf<K> | null {
    const entry = this.live(contributorId, kind);
    if (!entry) return null;
    this.remove(contributorId, kind);
    return narrow(entry.flow, kind);
  }

  /**
   * Put a taken session back after a failed commit, unless the
   * contributor already started a newer one.
   */
  restore(contributorId: number, flow: Flow): boolean {
    if (this.live(contributorId, flow.kind)) return false;
    this.set(contributorId, flow);
    return true;
  }

  delete(contributorId: number, kind: FlowKind): boolean {
    return this.live(contributorId, kind) !== null && this.remove(contributorId, kind);
  }

  /** Drops every flow of the contributor. Returns the kinds that were live. */
  clear(contributorId: number): FlowKind[] {
    const flows = this.entries.get(contributorId);
    if (!flows) return [];

    const now = this.now();
    const live = [...flows.entries()]
      .filter(([, entry]) => entry.expiresAt > now)
      .map(([kind]) => kind);
    this.entries.delete(contributorId);
    return live;
  }

  /** Evict expired entries. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let evicted = 0;

    for (const [contributorId, flows] of this.entries) {
      for (const [kind, entry] of flows) {
        if (entry.expiresAt <= now) {
          flows.delete(kind);
          evicted++;
        }
      }
      if (flows.size === 0) this.entries.delete(contributorId);
    }
    return evicted;
  }

  size(): number {
    let total = 0;
    for (const flows of this.entries.values()) total += flows.size;
    return total;
  }

  private live(contributorId: number, kind: FlowKind): Entry | null {
    const flows = this.entries.get(contributorId);
    const entry = flows?.get(kind);
    if (!flows || !entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.remove(contributorId, kind);
      return null;
    }
    return entry;
  }

  private remove(contributorId: number, kind: FlowKind): boolean {
    const flows = this.entries.get(contributorId);
    if (!flows) return false;
    const removed = flows.delete(kind);
    if (flows.size === 0) this.entries.delete(contributorId);
    return removed;
  }
}

function narrow<K extends FlowKind>(flow: Flow, kind: K): FlowOf<K> | null {
  return isKind(flow, kind) ? flow : null;
}

function isKind<K extends FlowKind>(flow: Flow, kind: K): flow is FlowOf<K> {
  return flow.kind === kind;
}
