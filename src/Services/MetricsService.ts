/**
 * MetricsService keeps in-memory counters for store operations and published events.
 * Synchronous and process-local; a snapshot is the only way to read it.
 *
 * Naming rules follow project conventions: camelCase for public, _camelCase for private/internal.
 */

export interface MetricsSnapshot {
    projectsCreated: number; // successful Create calls
    projectsUpdated: number; // successful Mutate calls
    projectsDeleted: number; // successful Delete calls
    operationFailures: number; // store operations that returned an error
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

/** Internal mutable state container */
interface MutableMetricsState extends MetricsSnapshot {}

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _state: MutableMetricsState = {
        projectsCreated: 0,
        projectsUpdated: 0,
        projectsDeleted: 0,
        operationFailures: 0,
        eventsPublished: {},
        collectedAt: Date.now(),
    };

    public IncProjectCreated(): void {
        this._state.projectsCreated++;
    }
    public IncProjectUpdated(): void {
        this._state.projectsUpdated++;
    }
    public IncProjectDeleted(): void {
        this._state.projectsDeleted++;
    }
    public IncOperationFailure(): void {
        this._state.operationFailures++;
    }
    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._state.eventsPublished[eventName] = (this._state.eventsPublished[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            projectsCreated: this._state.projectsCreated,
            projectsUpdated: this._state.projectsUpdated,
            projectsDeleted: this._state.projectsDeleted,
            operationFailures: this._state.operationFailures,
            eventsPublished: { ...this._state.eventsPublished },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._state.projectsCreated = 0;
        this._state.projectsUpdated = 0;
        this._state.projectsDeleted = 0;
        this._state.operationFailures = 0;
        this._state.eventsPublished = {};
    }
}

/** Global singleton instance. */
export const metricsService = new MetricsService();
