/**
 * Local Peer Transport
 * 
 * In-process transport that dispatches straight into WorkerService instances.
 * Used for single-machine simulation and tests.
 */

import { IPeerTransport, SendOptions } from '../../interfaces/IPeerTransport';
import { ILogger, ConsoleLogger } from '../../utils/ILogger';
import { WorkerId, WorkerRequest, WorkerResponse } from '../../types';
import { WorkerService } from '../../WorkerService';

export class LocalPeerTransport implements IPeerTransport {
    private logger: ILogger;
    private workers: Map<WorkerId, WorkerService> = new Map();

    constructor(workers: WorkerService[] = [], logger?: ILogger) {
        this.logger = logger || new ConsoleLogger('LocalPeerTransport');
        for (const worker of workers) {
            this.register(worker);
        }
    }

    register(worker: WorkerService): void {
        this.workers.set(worker.getWorkerId(), worker);
    }

    async getAvailableWorkers(): Promise<WorkerId[]> {
        return Array.from(this.workers.keys());
    }

    async send(workerId: WorkerId, request: WorkerRequest, options: SendOptions = {}): Promise<WorkerResponse> {
        const worker = this.workers.get(workerId);
        if (!worker) {
            throw new Error(`Unknown worker: ${workerId}`);
        }

        const { signal } = options;
        if (signal?.aborted) {
            throw new Error('Request aborted');
        }

        const reply = worker.handle({ ...request });
        if (!signal) {
            return reply;
        }

        return new Promise<WorkerResponse>((resolve, reject) => {
            const onAbort = (): void => {
                this.logger.debug('Local request aborted', { workerId, requestId: request.requestId });
                reject(new Error('Request aborted'));
            };
            signal.addEventListener('abort', onAbort, { once: true });
            void reply.then(
                (response) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(response);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    async shutdown(): Promise<void> {
        this.workers.clear();
    }
}
