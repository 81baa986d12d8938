/**
 * HTTP Peer Transport
 * 
 * Evaluator-side transport for workers reachable over HTTP.
 * Each worker exposes POST {endpoint}/inference taking { prompt, request_id }
 * and answering { prompt, request_id, output }.
 */

import axios, { AxiosInstance } from 'axios';
import { IPeerTransport, SendOptions } from '../../interfaces/IPeerTransport';
import { ILogger, ConsoleLogger } from '../../utils/ILogger';
import { WorkerId, WorkerRequest, WorkerResponse } from '../../types';

export interface WorkerEndpoint {
    workerId: WorkerId;
    endpoint: string;
}

/**
 * Read a worker reply without trusting its shape
 */
export function parseWorkerReply(data: unknown, request: WorkerRequest): WorkerResponse {
    if (typeof data !== 'object' || data === null) {
        throw new Error('Worker reply is not an object');
    }
    const requestId = 'request_id' in data && typeof data.request_id === 'string' ? data.request_id : request.requestId;
    const output = 'output' in data && typeof data.output === 'string' ? data.output : undefined;
    return { prompt: request.prompt, requestId, output };
}

export class HTTPPeerTransport implements IPeerTransport {
    private logger: ILogger;
    private endpoints: Map<WorkerId, string> = new Map();
    private client: AxiosInstance;

    constructor(endpoints: WorkerEndpoint[], logger?: ILogger, client?: AxiosInstance) {
        this.logger = logger || new ConsoleLogger('HTTPPeerTransport');
        this.client = client || axios.create({
            headers: { 'Content-Type': 'application/json' },
        });
        for (const { workerId, endpoint } of endpoints) {
            this.register(workerId, endpoint);
        }
    }

    register(workerId: WorkerId, endpoint: string): void {
        this.endpoints.set(workerId, endpoint.replace(/\/+$/, ''));
        this.logger.debug('Registered worker endpoint', { workerId, endpoint });
    }

    unregister(workerId: WorkerId): void {
        this.endpoints.delete(workerId);
    }

    async getAvailableWorkers(): Promise<WorkerId[]> {
        return Array.from(this.endpoints.keys());
    }

    async send(workerId: WorkerId, request: WorkerRequest, options: SendOptions = {}): Promise<WorkerResponse> {
        const endpoint = this.endpoints.get(workerId);
        if (!endpoint) {
            throw new Error(`Unknown worker: ${workerId}`);
        }

        try {
            const response = await this.client.post<unknown>(
                `${endpoint}/inference`,
                { prompt: request.prompt, request_id: request.requestId },
                { signal: options.signal, timeout: options.timeoutMs }
            );
            return parseWorkerReply(response.data, request);
        } catch (error) {
            this.logger.debug('Worker request failed', {
                workerId,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    async shutdown(): Promise<void> {
        this.endpoints.clear();
        this.logger.info('HTTP peer transport shut down');
    }
}
