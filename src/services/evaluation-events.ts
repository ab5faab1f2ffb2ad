import { EventEmitter } from 'events';
import type { EvaluationReport } from '../types/evaluation';

export interface ReportFailedEvent {
    answerId: string;
    evaluationJobId?: number;
    code: string;
    message: string;
}

export interface EvaluationEventMap {
    'report.completed': EvaluationReport;
    'report.failed': ReportFailedEvent;
}

export type EvaluationEventName = keyof EvaluationEventMap;

/**
 * Typed emitter for evaluation lifecycle events.
 */
export class EvaluationEvents {
    private readonly emitter = new EventEmitter();

    on<K extends EvaluationEventName>(event: K, listener: (payload: EvaluationEventMap[K]) => void): () => void {
        this.emitter.on(event, listener);
        return () => {
            this.emitter.off(event, listener);
        };
    }

    emit<K extends EvaluationEventName>(event: K, payload: EvaluationEventMap[K]): void {
        this.emitter.emit(event, payload);
    }

    listenerCount(event: EvaluationEventName): number {
        return this.emitter.listenerCount(event);
    }
}

// Singleton instance
let evaluationEvents: EvaluationEvents | null = null;

export function getEvaluationEvents(): EvaluationEvents {
    if (!evaluationEvents) {
        evaluationEvents = new EvaluationEvents();
    }
    return evaluationEvents;
}
