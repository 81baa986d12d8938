/**
 * Evaluation Sink Interface
 * 
 * Receives finished round reports (dashboards, telemetry, audit logs).
 */

import { RoundReport } from '../types';

export interface IEvaluationSink {
    recordRound(report: RoundReport): Promise<void>;
}
