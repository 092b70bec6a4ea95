import { remove } from "es-toolkit";
import type { CallbackEntry } from "./callback";
import type { EventTypeKey, SubscriberId } from "./types";

type SubscriberGroup = {
    subscriberId: SubscriberId;
    callbacks: CallbackEntry[];
};

function revokeGroup(group: SubscriberGroup): void {
    for (const entry of group.callbacks) {
        entry.revoke();
    }
}

/**
 * Subscriber registry keyed by event type.
 *
 * Per key, groups keep the order in which each subscriber first registered
 * for that type; callbacks inside a group keep their own registration order.
 * Empty groups and empty keys are dropped as soon as they appear.
 */
export class Registry {
    private readonly groups: Map<EventTypeKey, SubscriberGroup[]> = new Map();

    /** Number of event types with at least one callback. */
    get size(): number {
        return this.groups.size;
    }

    add(entry: CallbackEntry): void {
        let groups = this.groups.get(entry.key);
        if (!groups) {
            groups = [];
            this.groups.set(entry.key, groups);
        }
        const group = groups.find((g) => g.subscriberId === entry.subscriberId);
        if (group) {
            group.callbacks.push(entry);
        } else {
            groups.push({ subscriberId: entry.subscriberId, callbacks: [entry] });
        }
    }

    /** Drops a single callback. Returns `false` when it was not registered. */
    removeCallback(entry: CallbackEntry): boolean {
        const groups = this.groups.get(entry.key);
        const group = groups?.find((g) => g.subscriberId === entry.subscriberId);
        if (!groups || !group) return false;

        const removed = remove(group.callbacks, (c) => c === entry);
        if (removed.length === 0) return false;
        entry.revoke();

        if (group.callbacks.length === 0) {
            remove(groups, (g) => g === group);
        }
        if (groups.length === 0) {
            this.groups.delete(entry.key);
        }
        return true;
    }

    /** Drops the group of `subscriberId` under `key`. Returns `false` when absent. */
    removeOne(key: EventTypeKey, subscriberId: SubscriberId): boolean {
        const groups = this.groups.get(key);
        if (!groups) return false;

        const removed = remove(groups, (g) => g.subscriberId === subscriberId);
        removed.forEach(revokeGroup);
        if (groups.length === 0) {
            this.groups.delete(key);
        }
        return removed.length > 0;
    }

    /** Drops every group of `subscriberId`. Returns how many event types lost it. */
    removeAll(subscriberId: SubscriberId): number {
        let count = 0;
        for (const [key, groups] of this.groups) {
            const removed = remove(groups, (g) => g.subscriberId === subscriberId);
            removed.forEach(revokeGroup);
            count += removed.length;
            if (groups.length === 0) {
                this.groups.delete(key);
            }
        }
        return count;
    }

    /** Ordered copy of the live callbacks under `key`. */
    snapshot(key: EventTypeKey): CallbackEntry[] {
        const groups = this.groups.get(key);
        if (!groups) return [];
        return groups.flatMap((g) => g.callbacks);
    }

    subscriberCount(key: EventTypeKey): number {
        return this.groups.get(key)?.length ?? 0;
    }

    clear(): void {
        for (const groups of this.groups.values()) {
            groups.forEach(revokeGroup);
        }
        this.groups.clear();
    }
}
