/**
 * Central event bus for dispatching ledger events between components.
 */
import { EventEmitter } from 'events';
import type { EventName, EventPayloads } from '../Domain/index.js';
import { MetricsService, metricsService } from '../Services/MetricsService.js';

/**
 * MainEventBus is the central event system for all internal communication.
 * Every emit is counted in the attached MetricsService.
 */
export class MainEventBus extends EventEmitter {
    private readonly _metrics: MetricsService;

    /**
     * Creates a new MainEventBus instance.
     * @param metrics MetricsService - Counter sink (defaults to the global service)
     * @example
     * const bus = new MainEventBus(new MetricsService());
     */
    constructor(metrics: MetricsService = metricsService) {
        super();
        this._metrics = metrics;
    }

    public get metrics(): MetricsService {
        return this._metrics;
    }

    /** Typed emit helper enforcing known event names and payloads. */
    public Emit<T extends EventName>(eventName: T, payload: EventPayloads[T]): boolean {
        this._metrics.IncEvent(eventName);
        return super.emit(eventName, payload);
    }

    /** Typed on helper enforcing known event names and payloads. */
    public On<T extends EventName>(eventName: T, listener: (payload: EventPayloads[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
}

/**
 * Global event bus instance for the application.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('project.created', ({ projectId }) => console.log(projectId));
 */
export const MAIN_EVENT_BUS = new MainEventBus();
