/**
 * Topology Diff Engine
 *
 * Compares this cycle's stabilized readings with the prior snapshot and the
 * inventory and produces a typed ChangeSet. Pure: the prior snapshot and the
 * inventory view are loaded by the caller before any write of the cycle.
 *
 * Only `stable` and `absent` links take part. A cable counts as engine-owned
 * when any prior snapshot entry records its id; cables the engine does not own
 * are never modified, they surface as conflicts instead.
 */

import {
    canonicalPair,
    endpointKey,
    formatEndpoint,
    sameEndpoint,
    sortEndpoints,
} from '../utils/helpers.js';
import type {
    ActionKind,
    CableRecord,
    ChangeAction,
    ChangeSet,
    DeviceReading,
    Endpoint,
    InventoryInterfaceRef,
    InventoryView,
    LinkPair,
    SnapshotEntry,
    StabilizedLink,
} from './types.js';

export interface DiffInput {
    runId: string;
    readings: readonly DeviceReading[];
    prior: ReadonlyMap<string, SnapshotEntry>;
    inventory: InventoryView;
}

type PeerState =
    | { kind: 'unpolled' }
    | { kind: 'unreadable'; reason: string }
    | { kind: 'missing' }
    | { kind: 'link'; link: StabilizedLink };

type RemoveAction = Extract<ChangeAction, { kind: 'remove' }>;

const KIND_ORDER: Record<ActionKind, number> = {
    remove: 0,
    update: 1,
    add: 2,
    confirm: 3,
    unchanged: 4,
    conflict: 5,
    skipped: 6,
};

function actionKey(action: ChangeAction): string {
    return 'pair' in action ? action.pair.key : action.key;
}

function otherEnd(pair: LinkPair, endpoint: Endpoint): Endpoint {
    return sameEndpoint(pair.a, endpoint) ? pair.b : pair.a;
}

function groupKey(endpoints: Endpoint[]): string {
    return sortEndpoints(endpoints).map(endpointKey).join('|');
}

function connectsPair(cable: CableRecord, aId: number, bId: number): boolean {
    if (cable.aSide.length !== 1 || cable.bSide.length !== 1) return false;
    const x = cable.aSide[0].interfaceId;
    const y = cable.bSide[0].interfaceId;
    return (x === aId && y === bId) || (x === bId && y === aId);
}

function cableEndpoints(cable: CableRecord): Endpoint[] {
    return [...cable.aSide, ...cable.bSide].map(t => ({ device: t.device, interface: t.interface }));
}

export function computeChangeSet(input: DiffInput): ChangeSet {
    const { runId, readings, prior, inventory } = input;

    const readingsByDevice = new Map(readings.map(reading => [reading.device, reading]));
    const links = new Map<string, StabilizedLink>();
    for (const reading of readings) {
        for (const link of reading.links) links.set(endpointKey(link.local), link);
    }

    const ownedCables = new Set<number>();
    for (const entry of prior.values()) {
        if (entry.cableId !== null) ownedCables.add(entry.cableId);
    }

    const peerState = (endpoint: Endpoint): PeerState => {
        const reading = readingsByDevice.get(endpoint.device);
        if (!reading) return { kind: 'unpolled' };
        if (reading.health !== 'ok') {
            return { kind: 'unreadable', reason: `${endpoint.device} is ${reading.health} this cycle` };
        }
        const link = links.get(endpointKey(endpoint));
        if (!link) {
            // A filtered-out port can neither confirm nor contradict the link
            return reading.excluded.includes(endpoint.interface) ? { kind: 'unpolled' } : { kind: 'missing' };
        }
        if (link.confidence === 'unstable') {
            return { kind: 'unreadable', reason: `${formatEndpoint(endpoint)} is unstable this cycle` };
        }
        return { kind: 'link', link };
    };

    const actions: ChangeAction[] = [];
    const conflicted = new Set<string>();

    const conflict = (endpoints: Endpoint[], reason: string) => {
        const sorted = sortEndpoints(endpoints);
        actions.push({ kind: 'conflict', key: groupKey(sorted), endpoints: sorted, reason });
        for (const endpoint of sorted) conflicted.add(endpointKey(endpoint));
    };

    const skip = (endpoints: Endpoint[], reason: string) => {
        const sorted = sortEndpoints(endpoints);
        actions.push({ kind: 'skipped', key: groupKey(sorted), endpoints: sorted, reason });
    };

    const stableLinks = [...links.values()]
        .filter((link): link is StabilizedLink & { remote: Endpoint } => link.confidence === 'stable' && link.remote !== null)
        .sort((x, y) => endpointKey(x.local).localeCompare(endpointKey(y.local)));

    // Two local interfaces claiming the same remote endpoint
    const claims = new Map<string, Array<StabilizedLink & { remote: Endpoint }>>();
    for (const link of stableLinks) {
        const key = endpointKey(link.remote);
        claims.set(key, [...(claims.get(key) ?? []), link]);
    }
    for (const claimants of claims.values()) {
        if (claimants.length < 2) continue;
        const reason = `${claimants.length} interfaces report ${formatEndpoint(claimants[0].remote)} as their neighbor`;
        for (const link of claimants) conflict([link.local, link.remote], reason);
    }

    // Links whose remote device was polled must be reported from both sides
    const candidates = new Map<string, LinkPair>();
    for (const link of stableLinks) {
        if (conflicted.has(endpointKey(link.local))) continue;
        const pair = canonicalPair(link.local, link.remote);
        const peer = peerState(link.remote);

        if (peer.kind === 'missing') {
            conflict(
                [link.local, link.remote],
                `${link.remote.device} was polled but does not report interface ${link.remote.interface}`,
            );
            continue;
        }
        if (peer.kind === 'unreadable') {
            if (!candidates.has(pair.key)) skip([link.local, link.remote], `cannot confirm from the other side: ${peer.reason}`);
            continue;
        }
        if (peer.kind === 'link' && !(peer.link.confidence === 'stable' && sameEndpoint(peer.link.remote, link.local))) {
            conflict(
                [link.local, link.remote],
                `${formatEndpoint(link.local)} reports ${formatEndpoint(link.remote)}, which reports ${formatEndpoint(peer.link.remote)}`,
            );
            continue;
        }
        candidates.set(pair.key, pair);
    }

    const reusedCables = new Set<number>();
    const removals = new Map<string, RemoveAction>();

    const addRemoval = (key: string, endpoint: Endpoint | null, cableId: number | null, reason: string) => {
        const existing = removals.get(key);
        if (existing) {
            if (endpoint) existing.tracked = sortEndpoints([...existing.tracked, endpoint]);
            return;
        }
        removals.set(key, { kind: 'remove', key, tracked: endpoint ? [endpoint] : [], cableId, reason });
    };

    const cableOf = (ref: InventoryInterfaceRef): CableRecord | undefined =>
        ref.cableId === null ? undefined : inventory.cables.get(ref.cableId);

    for (const pair of [...candidates.values()].sort((x, y) => x.key.localeCompare(y.key))) {
        if (conflicted.has(endpointKey(pair.a)) || conflicted.has(endpointKey(pair.b))) continue;

        const tracked = [pair.a, pair.b].filter(endpoint => links.has(endpointKey(endpoint)));
        const refA = inventory.interfaces.get(endpointKey(pair.a));
        const refB = inventory.interfaces.get(endpointKey(pair.b));
        if (!refA || !refB) {
            const unknown = [refA ? null : pair.a, refB ? null : pair.b].filter((e): e is Endpoint => e !== null);
            skip([pair.a, pair.b], `not found in inventory: ${unknown.map(formatEndpoint).join(', ')}`);
            continue;
        }
        const terminations = { aInterfaceId: refA.id, bInterfaceId: refB.id };

        const attached = [...new Set([refA.cableId, refB.cableId].filter((id): id is number => id !== null))];
        const matching = attached.length === 1 ? cableOf(refA) : undefined;

        if (matching && refA.cableId === refB.cableId && connectsPair(matching, refA.id, refB.id)) {
            const expected = ownedCables.has(matching.id) ? matching.id : null;
            const current = tracked.every(endpoint => {
                const entry = prior.get(endpointKey(endpoint));
                return entry !== undefined && sameEndpoint(entry.remote, otherEnd(pair, endpoint)) && entry.cableId === expected;
            });
            if (current) {
                actions.push({ kind: 'unchanged', pair, cableId: matching.id });
            } else {
                actions.push({
                    kind: 'confirm',
                    pair,
                    tracked,
                    cableId: expected,
                    reason: expected === null
                        ? `inventory already holds cable #${matching.id} for this link`
                        : `snapshot out of date for managed cable #${matching.id}`,
                });
            }
            continue;
        }

        if (attached.length > 0) {
            const foreign = attached.filter(id => !ownedCables.has(id));
            if (foreign.length > 0) {
                const details = foreign.map(id => {
                    const holder = refA.cableId === id ? pair.a : pair.b;
                    const record = inventory.cables.get(id);
                    const peers = record ? cableEndpoints(record).filter(e => !sameEndpoint(e, holder)) : [];
                    const target = peers.length > 0 ? peers.map(formatEndpoint).join(', ') : 'an unknown endpoint';
                    return `cable #${id} on ${formatEndpoint(holder)} connects to ${target} and is not managed by autocabling`;
                });
                conflict([pair.a, pair.b], details.join('; '));
                continue;
            }

            const [reuse, ...superseded] = attached;
            const record = inventory.cables.get(reuse);
            actions.push({
                kind: 'update',
                pair,
                terminations,
                tracked,
                cableId: reuse,
                previous: record ? sortEndpoints(cableEndpoints(record)) : [],
                reason: `neighbor changed, re-terminating managed cable #${reuse}`,
            });
            reusedCables.add(reuse);
            for (const id of superseded) {
                addRemoval(`cable:${id}`, null, id, `managed cable #${id} superseded by ${pair.key}`);
            }
            continue;
        }

        const priorRemotes: Endpoint[] = [];
        let moved = false;
        for (const endpoint of tracked) {
            const entry = prior.get(endpointKey(endpoint));
            if (!entry?.remote) continue;
            priorRemotes.push(entry.remote);
            if (!sameEndpoint(entry.remote, otherEnd(pair, endpoint))) moved = true;
        }

        if (moved) {
            actions.push({
                kind: 'update',
                pair,
                terminations,
                tracked,
                cableId: null,
                previous: sortEndpoints(priorRemotes),
                reason: 'neighbor changed and no managed cable is attached, creating one',
            });
        } else {
            actions.push({
                kind: 'add',
                pair,
                terminations,
                tracked,
                reason: priorRemotes.length > 0 ? 'managed cable missing from inventory, recreating' : 'new link',
            });
        }
    }

    // Links gone since the last confirmed snapshot
    for (const link of links.values()) {
        if (link.confidence !== 'absent') continue;
        const key = endpointKey(link.local);
        const entry = prior.get(key);
        // Conflicted interfaces are reported, never removed
        if (!entry?.remote || conflicted.has(key)) continue;

        const formerPeer = entry.remote;
        const peer = peerState(formerPeer);
        if (peer.kind === 'unreadable') {
            skip([link.local, formerPeer], `absence not confirmed by the other side: ${peer.reason}`);
            continue;
        }

        let cableId = entry.cableId;
        let reason = `link to ${formatEndpoint(formerPeer)} confirmed absent`;
        if (cableId !== null && reusedCables.has(cableId)) {
            reason += `; cable #${cableId} was reused for a moved link`;
            cableId = null;
        } else if (cableId !== null) {
            const ref = inventory.interfaces.get(key);
            if (!ref) {
                skip([link.local, formerPeer], `not found in inventory: ${formatEndpoint(link.local)}`);
                continue;
            }
            if (ref.cableId !== cableId) {
                reason += `; cable #${cableId} is no longer attached`;
                cableId = null;
            }
        }

        const removalKey = cableId !== null ? `cable:${cableId}` : `pair:${canonicalPair(link.local, formerPeer).key}`;
        addRemoval(removalKey, link.local, cableId, reason);
    }

    actions.push(...removals.values());
    actions.sort((x, y) => KIND_ORDER[x.kind] - KIND_ORDER[y.kind] || actionKey(x).localeCompare(actionKey(y)));

    return { runId, actions };
}

export function countActions(changeSet: ChangeSet): Record<ActionKind, number> {
    const counts: Record<ActionKind, number> = {
        add: 0,
        update: 0,
        remove: 0,
        confirm: 0,
        unchanged: 0,
        conflict: 0,
        skipped: 0,
    };
    for (const action of changeSet.actions) counts[action.kind]++;
    return counts;
}

/**
 * True when applying the ChangeSet would touch neither the inventory nor the
 * State Store
 */
export function isQuiescent(changeSet: ChangeSet): boolean {
    return changeSet.actions.every(action => action.kind === 'unchanged');
}
