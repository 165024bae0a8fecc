import type { BounceError } from './replay';

export type SolveStatus = 'solved' | 'no-valid-placement' | 'cancelled';
export type PipelineStage = 'search' | 'construction' | 'walls' | 'carve' | 'compaction';

export interface PrefixAcceptedPayload {
    readonly depth: number;
    readonly total: number;
    readonly prefix: readonly boolean[];
}

export interface PrefixRejectedPayload {
    readonly depth: number;
    readonly total: number;
    readonly prefix: readonly boolean[];
    readonly error: BounceError;
}

export interface SolveCompletedPayload {
    readonly status: SolveStatus;
    readonly total: number;
    readonly nodesVisited: number;
}

export interface StageCompletedPayload {
    readonly stage: PipelineStage;
    readonly count: number;
}

export interface ChoreographyEventMap {
    readonly PrefixAccepted: PrefixAcceptedPayload;
    readonly PrefixRejected: PrefixRejectedPayload;
    readonly SolveCompleted: SolveCompletedPayload;
    readonly StageCompleted: StageCompletedPayload;
}

export type ChoreographyEventName = keyof ChoreographyEventMap;

export interface EventEnvelope<EventName extends ChoreographyEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: ChoreographyEventMap[EventName];
}

export type EventListener<EventName extends ChoreographyEventName> = (
    event: EventEnvelope<EventName>,
) => void;

export interface ChoreographyEventBus {
    publish<EventName extends ChoreographyEventName>(
        this: void,
        type: EventName,
        payload: ChoreographyEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends ChoreographyEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    unsubscribe<EventName extends ChoreographyEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): void;
    clear(this: void): void;
    listenerCount(this: void, type: ChoreographyEventName): number;
}

type ListenerSet<EventName extends ChoreographyEventName> = Set<EventListener<EventName>>;

type ListenerRegistry = {
    [EventName in ChoreographyEventName]: ListenerSet<EventName>;
};

const createRegistry = (): ListenerRegistry => ({
    PrefixAccepted: new Set(),
    PrefixRejected: new Set(),
    SolveCompleted: new Set(),
    StageCompleted: new Set(),
});

export interface EventBusOptions {
    readonly now?: () => number;
}

export const createEventBus = (options: EventBusOptions = {}): ChoreographyEventBus => {
    const registry = createRegistry();
    const resolveNow = options.now ?? Date.now;

    const listenersFor = <EventName extends ChoreographyEventName>(type: EventName): ListenerSet<EventName> =>
        registry[type];

    const publish: ChoreographyEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const listeners = listenersFor(type);
        if (listeners.size === 0) {
            return;
        }

        const envelope = { type, payload, timestamp };
        for (const listener of [...listeners]) {
            listener(envelope);
        }
    };

    const unsubscribe: ChoreographyEventBus['unsubscribe'] = (type, listener) => {
        listenersFor(type).delete(listener);
    };

    const subscribe: ChoreographyEventBus['subscribe'] = (type, listener) => {
        listenersFor(type).add(listener);
        return () => unsubscribe(type, listener);
    };

    const clear: ChoreographyEventBus['clear'] = () => {
        Object.values(registry).forEach((listeners) => {
            listeners.clear();
        });
    };

    const listenerCount: ChoreographyEventBus['listenerCount'] = (type) => listenersFor(type).size;

    return {
        publish,
        subscribe,
        unsubscribe,
        clear,
        listenerCount,
    };
};
