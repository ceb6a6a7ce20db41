/**
 * Cabling engine domain types
 *
 * Shared by the neighbor reader, stability gate, diff engine and
 * reconciliation driver.
 */

export interface Endpoint {
    device: string;
    interface: string;
}

/** Local interface name → directly connected neighbor, or null when none is advertised */
export type NeighborTable = Map<string, Endpoint | null>;

export interface DeviceSnapshot {
    device: string;
    round: number;
    observedAt: Date;
    neighbors: NeighborTable;
    /** Interfaces left out by the exclusion filters */
    excluded: string[];
}

export interface NeighborObservation {
    readonly local: Endpoint;
    readonly remote: Endpoint | null;
    readonly observedAt: Date;
    readonly round: number;
}

export type LinkConfidence = 'stable' | 'unstable' | 'absent';

export interface StabilizedLink {
    local: Endpoint;
    remote: Endpoint | null;
    confidence: LinkConfidence;
    observations: readonly NeighborObservation[];
}

/**
 * ok: every round succeeded
 * partial: some rounds failed, every interface is unstable
 * degraded: no round succeeded (or the device could not be polled at all)
 */
export type DeviceHealth = 'ok' | 'partial' | 'degraded';

export interface DeviceReading {
    device: string;
    health: DeviceHealth;
    links: StabilizedLink[];
    errors: string[];
    /** Interfaces any round left out by the exclusion filters */
    excluded: string[];
}

export type RoundResult =
    | { ok: true; snapshot: DeviceSnapshot }
    | { ok: false; round: number; error: Error };

export interface PollTarget {
    name: string;
    address: string | null;
}

export interface SnapshotEntry {
    device: string;
    interface: string;
    remote: Endpoint | null;
    cableId: number | null;
    runId: string;
    confirmedAt: Date;
}

export interface CableTermination {
    interfaceId: number;
    device: string;
    interface: string;
}

export interface CableRecord {
    id: number;
    status: string;
    description: string;
    aSide: CableTermination[];
    bSide: CableTermination[];
}

export interface InventoryInterfaceRef {
    id: number;
    cableId: number | null;
}

/**
 * What the inventory holds for the endpoints involved in one cycle
 */
export interface InventoryView {
    interfaces: ReadonlyMap<string, InventoryInterfaceRef>;
    cables: ReadonlyMap<number, CableRecord>;
}

/** Canonically ordered pair: `a` sorts before `b` */
export interface LinkPair {
    key: string;
    a: Endpoint;
    b: Endpoint;
}

export interface PairTerminations {
    aInterfaceId: number;
    bInterfaceId: number;
}

export type ChangeAction =
    | {
          kind: 'add';
          pair: LinkPair;
          terminations: PairTerminations;
          tracked: Endpoint[];
          reason: string;
      }
    | {
          kind: 'update';
          pair: LinkPair;
          terminations: PairTerminations;
          tracked: Endpoint[];
          /** Engine-owned cable to re-terminate; null creates a new one */
          cableId: number | null;
          previous: Endpoint[];
          reason: string;
      }
    | {
          kind: 'remove';
          key: string;
          /** Endpoints whose snapshot entries transition to "no remote" */
          tracked: Endpoint[];
          /** Engine-owned cable to delete; null is a store-only transition */
          cableId: number | null;
          reason: string;
      }
    | {
          kind: 'confirm';
          pair: LinkPair;
          tracked: Endpoint[];
          /** Cable recorded as engine-owned, null when the matching cable is not ours */
          cableId: number | null;
          reason: string;
      }
    | {
          kind: 'unchanged';
          pair: LinkPair;
          cableId: number | null;
      }
    | {
          kind: 'conflict';
          key: string;
          endpoints: Endpoint[];
          reason: string;
      }
    | {
          kind: 'skipped';
          key: string;
          endpoints: Endpoint[];
          reason: string;
      };

export type ActionKind = ChangeAction['kind'];

export interface ChangeSet {
    runId: string;
    actions: ChangeAction[];
}

export type OutcomeStatus = 'applied' | 'planned' | 'failed' | 'noop';

export interface ActionOutcome {
    action: ChangeAction;
    status: OutcomeStatus;
    cableId: number | null;
    error?: string;
}

export interface CycleSummary {
    runId: string;
    startedAt: Date;
    completedAt: Date;
    dryRun: boolean;
    devicesPolled: number;
    degradedDevices: string[];
    partialDevices: string[];
    unstable: Endpoint[];
    counts: Record<ActionKind, number>;
    failed: number;
    outcomes: ActionOutcome[];
}
