import { Get, JsonController, QueryParam } from 'routing-controllers';
import { Service } from 'typedi';
import { InferenceClient } from '../services/inference/InferenceClient';
import { SessionRegistry } from '../services/session/SessionRegistry';

export interface HealthReport {
    status: 'ok';
    sessions: number;
    backend?: 'reachable' | 'unreachable';
}

@Service()
@JsonController()
export class HealthController {
    constructor(
        private readonly registry: SessionRegistry,
        private readonly inference: InferenceClient,
    ) {}

    /** Liveness; `?probe=backend` also checks the model server within the probe timeout. */
    @Get('/health')
    async health(@QueryParam('probe') probe?: string): Promise<HealthReport> {
        const report: HealthReport = { status: 'ok', sessions: this.registry.size };
        if (probe === 'backend') {
            report.backend = (await this.inference.probe()) ? 'reachable' : 'unreachable';
        }
        return report;
    }
}
