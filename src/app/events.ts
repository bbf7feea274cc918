import type { WallHitSide, ImpactAxis } from 'physics/collisions';

export type TerminationReason = 'complete' | 'force-limit' | 'frame-limit';

export interface WallHitPayload {
    readonly frame: number;
    readonly sides: readonly WallHitSide[];
    readonly speed: number;
}

export interface PaddleHitPayload {
    readonly frame: number;
    readonly impactOffset: number;
    readonly speed: number;
}

export interface BrickHitPayload {
    readonly frame: number;
    readonly col: number;
    readonly row: number;
    readonly axis: ImpactAxis;
    readonly remainingStrength: number;
}

export interface BrickBreakPayload {
    readonly frame: number;
    readonly col: number;
    readonly row: number;
    readonly maxStrength: number;
    readonly count: number;
    readonly destroyedTotal: number;
}

export interface TargetAbandonedPayload {
    readonly frame: number;
    readonly targetX: number;
    readonly framesWaited: number;
}

export interface RunCompletedPayload {
    readonly frame: number;
    readonly termination: TerminationReason;
    readonly destroyed: number;
    readonly total: number;
}

export interface SimulationEventMap {
    readonly WallHit: WallHitPayload;
    readonly PaddleHit: PaddleHitPayload;
    readonly BrickHit: BrickHitPayload;
    readonly BrickBreak: BrickBreakPayload;
    readonly TargetAbandoned: TargetAbandonedPayload;
    readonly RunCompleted: RunCompletedPayload;
}

export type SimulationEventName = keyof SimulationEventMap;

export interface EventEnvelope<EventName extends SimulationEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: SimulationEventMap[EventName];
}

export type EventListener<EventName extends SimulationEventName> = (
    event: EventEnvelope<EventName>,
) => void;

export interface SimulationEventBus {
    publish<EventName extends SimulationEventName>(
        this: void,
        type: EventName,
        payload: SimulationEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends SimulationEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends SimulationEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
}

type InternalListener = EventListener<SimulationEventName>;

type ListenerRegistry = Map<SimulationEventName, Set<InternalListener>>;

const ensureListenerSet = (registry: ListenerRegistry, type: SimulationEventName): Set<InternalListener> => {
    const existing = registry.get(type);
    if (existing) {
        return existing;
    }

    const created = new Set<InternalListener>();
    registry.set(type, created);
    return created;
};

export interface EventBusOptions {
    readonly now?: () => number;
}

export const createEventBus = (options: EventBusOptions = {}): SimulationEventBus => {
    const registry: ListenerRegistry = new Map();
    const resolveNow = options.now ?? Date.now;

    const publish: SimulationEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = registry.get(type);
        if (!listeners || listeners.size === 0) {
            return;
        }

        const envelope = { type, payload, timestamp };
        for (const listener of listeners) {
            listener(envelope);
        }
    };

    const unsubscribe: SimulationEventBus['unsubscribe'] = (type, listener) => {
        const listeners = registry.get(type);
        if (!listeners) {
            return;
        }

        listeners.delete(listener as InternalListener);
        if (listeners.size === 0) {
            registry.delete(type);
        }
    };

    const subscribe: SimulationEventBus['subscribe'] = (type, listener) => {
        const listeners = ensureListenerSet(registry, type);
        listeners.add(listener as InternalListener);
        return () => unsubscribe(type, listener);
    };

    const clear: SimulationEventBus['clear'] = () => {
        registry.clear();
    };

    return {
        publish,
        subscribe,
        unsubscribe,
        clear,
    };
};
