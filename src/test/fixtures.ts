import { AppConfig } from '../config';
import { ChatService } from '../services/ChatService';
import { InferenceClient } from '../services/inference/InferenceClient';
import { InferenceFault } from '../services/inference/InferenceFault';
import { PromptAssembler } from '../services/prompt/PromptAssembler';
import { SessionRegistry } from '../services/session/SessionRegistry';
import { TranscriptStore } from '../services/session/TranscriptStore';
import { InferenceBackend } from '../services/inference/types';
import { GenerationRequest } from '../types/chat';
import { Clock } from '../utils/clock';

type ConfigPatch = {
    inference?: Partial<AppConfig['inference']>;
    prompt?: Partial<AppConfig['prompt']>;
    sessions?: Partial<AppConfig['sessions']>;
};

export function makeConfig(patch: ConfigPatch = {}): AppConfig {
    return {
        server: { host: '127.0.0.1', port: 0 },
        logLevel: 'error',
        inference: {
            baseUrl: 'http://localhost:8081',
            model: 'local-model',
            apiKey: 'test-key',
            timeoutMs: 1_000,
            maxRetries: 2,
            retryDelayMs: 1,
            retryBackoff: 2,
            retryMaxDelayMs: 10,
            requestDeadlineMs: 60_000,
            probeTimeoutMs: 50,
            ...patch.inference,
        },
        prompt: {
            limits: { maxContextTokens: 4096, systemReserve: 200, responseReserve: 500 },
            minTokens: 100,
            maxTokens: 4096,
            defaultMaxTokens: 512,
            temperature: 0.7,
            topP: 0.95,
            systemPrompt: 'Be helpful. Up to {{max_tokens}} tokens.',
            ...patch.prompt,
        },
        sessions: {
            idleTimeoutMs: 60_000,
            sweepIntervalMs: 10_000,
            ...patch.sessions,
        },
    };
}

export class ManualClock {
    private time: number;

    constructor(start = Date.parse('2026-01-01T00:00:00.000Z')) {
        this.time = start;
    }

    readonly now: Clock = () => new Date(this.time);

    advance(ms: number): void {
        this.time += ms;
    }
}

export type BackendStep =
    | { reply: string }
    | { fault: InferenceFault }
    | { error: unknown }
    | 'hang';

/** Plays back a fixed script, one step per call, and records what it was asked. */
export class ScriptedBackend implements InferenceBackend {
    readonly requests: GenerationRequest[] = [];
    readonly signals: AbortSignal[] = [];
    pings = 0;

    constructor(private readonly steps: BackendStep[]) {}

    async complete(request: GenerationRequest, signal: AbortSignal): Promise<string> {
        this.requests.push(request);
        this.signals.push(signal);
        const step = this.steps.shift();
        if (step === undefined) {
            throw new Error('ScriptedBackend ran out of steps');
        }
        if (step === 'hang') {
            return new Promise<string>(() => undefined);
        }
        if ('reply' in step) {
            return step.reply;
        }
        if ('fault' in step) {
            throw step.fault;
        }
        throw step.error;
    }

    async ping(): Promise<void> {
        this.pings++;
        const step = this.steps.shift();
        if (step === 'hang') {
            return new Promise<void>(() => undefined);
        }
        if (step !== undefined && 'fault' in step) {
            throw step.fault;
        }
    }
}

export const connectionRefused = (): InferenceFault =>
    new InferenceFault('connection', 'connect ECONNREFUSED 127.0.0.1:8081');

export interface ChatHarness {
    service: ChatService;
    registry: SessionRegistry;
    transcripts: TranscriptStore;
    inference: InferenceClient;
    backend: ScriptedBackend;
    clock: ManualClock;
}

/** Wires the real services by hand around a scripted backend and a manual clock. */
export function makeHarness(backend: ScriptedBackend, config: AppConfig = makeConfig()): ChatHarness {
    const clock = new ManualClock();
    const registry = new SessionRegistry(config, clock.now);
    const transcripts = new TranscriptStore(clock.now);
    const inference = new InferenceClient(config, backend, clock.now);
    const service = new ChatService(registry, transcripts, new PromptAssembler(config), inference, config, clock.now);
    return { service, registry, transcripts, inference, backend, clock };
}
