/**
 * Peer Transport Interface
 * 
 * Request/reply channel between the evaluator and workers.
 * Supports multiple transport implementations (HTTP, in-process, etc.)
 */

import { WorkerId, WorkerRequest, WorkerResponse } from '../types';

export interface SendOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface IPeerTransport {
    /**
     * Workers that can currently be dispatched to
     */
    getAvailableWorkers(): Promise<WorkerId[]>;

    /**
     * Send one request to one worker and wait for its reply.
     * Rejects on transport failure or when the signal aborts.
     */
    send(workerId: WorkerId, request: WorkerRequest, options?: SendOptions): Promise<WorkerResponse>;

    /**
     * Shutdown the transport
     */
    shutdown(): Promise<void>;
}
