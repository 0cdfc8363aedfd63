import { SpawnerConfig } from './config';
import { EndpointResolver } from './endpointResolver';
import {
    CancelUnconfirmed, JobFailed, PollTimeout, ResolutionError, SpawnerBusyError, StartAborted, formatErrorMessage,
} from './errors';
import { JobIdStore } from './jobIdStore';
import { buildSubmissionRequest } from './jobScript';
import { Logger } from './logger';
import { SlurmClient } from './slurmClient';
import { SubmissionQueue } from './submissionQueue';
import {
    JobId, LifecyclePhase, PollStatus, SchedulerState, SessionContext, Spawner, SpawnerState, StartOptions, StartResult,
} from './types';

export type Sleep = (ms: number) => Promise<void>;

export interface SlurmSpawnerDeps {
    client: SlurmClient;
    queue: SubmissionQueue;
    config: SpawnerConfig;
    logger?: Logger;
    resolver?: EndpointResolver;
    sleep?: Sleep;
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function isAlive(state: SchedulerState): boolean {
    return state === 'RUNNING' || state === 'PENDING';
}

/**
 * Runs one single-user server as one Slurm batch job.
 *
 * idle -> submitting -> awaiting-run -> running -> stopping -> idle, and straight back to
 * idle from anywhere the scheduler reports failure. Public methods never throw.
 */
export class SlurmSpawner implements Spawner {
    private readonly client: SlurmClient;
    private readonly queue: SubmissionQueue;
    private readonly config: SpawnerConfig;
    private readonly logger: Logger;
    private readonly resolver: EndpointResolver;
    private readonly sleep: Sleep;
    private readonly store = new JobIdStore();
    private currentPhase: LifecyclePhase = 'idle';
    private inFlight?: { abort: AbortController; done: Promise<StartResult> };

    constructor(deps: SlurmSpawnerDeps) {
        this.client = deps.client;
        this.queue = deps.queue;
        this.config = deps.config;
        this.logger = deps.logger ?? new Logger(undefined, deps.config.logLevel);
        this.resolver = deps.resolver ?? new EndpointResolver(deps.client);
        this.sleep = deps.sleep ?? sleep;
    }

    get phase(): LifecyclePhase { return this.currentPhase; }
    get jobId(): JobId { return this.store.get(); }

    public async start(session: SessionContext, options: StartOptions = {}): Promise<StartResult> {
        if (this.currentPhase !== 'idle' || this.store.has()) {
            const error = new SpawnerBusyError(this.currentPhase === 'idle' ? 'holding a job' : this.currentPhase);
            this.logger.error(error.message);
            return { ok: false, error };
        }

        this.currentPhase = 'submitting';
        const abort = new AbortController();
        const forwardAbort = () => abort.abort();
        options.signal?.addEventListener('abort', forwardAbort, { once: true });
        if (options.signal?.aborted) abort.abort();

        const done = this.launch(session, options.signal, abort.signal);
        this.inFlight = { abort, done };
        try {
            return await done;
        } finally {
            if (this.inFlight?.done === done) this.inFlight = undefined;
            options.signal?.removeEventListener('abort', forwardAbort);
        }
    }

    public async poll(): Promise<PollStatus> {
        const jobId = this.store.get();
        if (!jobId) {
            if (!this.inFlight) this.currentPhase = 'idle';
            return 'not-running';
        }

        let state: SchedulerState;
        try {
            state = await this.client.queryState(jobId);
        } catch (err) {
            this.logger.warn(`State query for job ${jobId} failed: ${formatErrorMessage(err)}`);
            state = 'UNSUBMITTED';
        }
        if (isAlive(state)) return 'alive';
        // start() drops its own job on failure
        if (this.inFlight) return 'not-running';

        this.logger.info(`Job ${jobId} is no longer running`);
        this.clearState();
        return 'not-running';
    }

    /**
     * Best effort. With `now` unset and a grace period configured, the job gets SIGTERM
     * first and is only cancelled if it is still alive after the grace period. A start still
     * in flight is aborted instead, and its job cancelled once submitted.
     */
    public async stop(now = false): Promise<void> {
        if (this.inFlight) {
            this.logger.info(`Stop requested while the server is ${this.currentPhase}, aborting start`);
            this.inFlight.abort.abort();
            await this.inFlight.done;
            return;
        }
        if ((await this.poll()) === 'not-running') return;

        const jobId = this.store.get();
        this.currentPhase = 'stopping';
        try {
            if (!now && this.config.stopGraceMs > 0) {
                this.logger.info(`Sending SIGTERM to job ${jobId}`);
                await this.client.cancel(jobId, { sendSignal: 'TERM' });
                await this.sleep(this.config.stopGraceMs);
                if ((await this.poll()) === 'not-running') return;
            }

            this.logger.info(`Cancelling slurm job ${jobId}`);
            const outcome = await this.client.cancel(jobId);
            if (outcome !== 'unknown') {
                this.logger.info(`Job ${jobId} ${outcome === 'cancelled' ? 'cancelled' : 'already finished'}`);
                this.clearState();
                return;
            }

            if ((await this.poll()) === 'alive') {
                this.logger.warn(new CancelUnconfirmed(jobId).message);
            }
        } catch (err) {
            this.logger.warn(`Stopping job ${jobId} failed: ${formatErrorMessage(err)}`);
        } finally {
            if (this.currentPhase === 'stopping') this.currentPhase = this.store.has() ? 'running' : 'idle';
        }
    }

    public loadState(state: SpawnerState): void {
        this.store.load(state);
        this.currentPhase = this.store.has() ? 'running' : 'idle';
    }

    public getState(): SpawnerState {
        return this.store.toState();
    }

    public clearState(): void {
        this.store.clear();
        this.currentPhase = 'idle';
    }

    /**
     * `submitSignal` only ever comes from the caller: an internal abort must not kill sbatch
     * after the job may already be queued, so it is honoured from the first state query on.
     */
    private async launch(session: SessionContext, submitSignal: AbortSignal | undefined, signal: AbortSignal): Promise<StartResult> {
        this.logger.info(`Spawning ${session.command.join(' ')} for user ${session.user}`);
        try {
            const request = buildSubmissionRequest(this.config, session);
            const jobId = await this.queue.run(() => this.client.submit(request, { signal: submitSignal }));
            this.store.set(jobId);
            this.currentPhase = 'awaiting-run';

            await this.waitForRunning(jobId, signal);

            const endpoint = await this.resolver.resolve(jobId, session.port, { signal });
            if (signal.aborted) throw new StartAborted(jobId);
            this.currentPhase = 'running';
            this.logger.info(`Server for user ${session.user} is at ${endpoint.host}:${endpoint.port} (job ${jobId})`);
            return { ok: true, jobId, endpoint };
        } catch (err) {
            const error = err instanceof Error ? err : new Error(formatErrorMessage(err));
            this.logger.error(`Server for user ${session.user} failed to start: ${formatErrorMessage(error)}`);
            await this.abandon(error);
            return { ok: false, error };
        }
    }

    private async waitForRunning(jobId: JobId, signal?: AbortSignal): Promise<void> {
        const attempts = this.config.startAttempts;
        for (let attempt = 1; attempt <= attempts; attempt++) {
            if (signal?.aborted) throw new StartAborted(jobId);
            const state = await this.client.queryState(jobId, { signal });
            if (signal?.aborted) throw new StartAborted(jobId);

            this.logger.debug(`Job ${jobId} state ${state} (attempt ${attempt}/${attempts})`);
            if (state === 'RUNNING') return;
            if (state !== 'PENDING') throw new JobFailed(jobId, state === 'UNSUBMITTED' ? '' : state);
            if (attempt < attempts) await this.sleep(this.config.pollIntervalMs);
        }
        throw new PollTimeout(jobId, attempts);
    }

    /**
     * Drop the job after a failed start. A job that may still be queued or running is
     * cancelled so it does not hold an allocation nobody will connect to.
     */
    private async abandon(error: Error): Promise<void> {
        const jobId = this.store.get();
        const mayBeAlive = error instanceof PollTimeout || error instanceof ResolutionError || error instanceof StartAborted;
        if (jobId && mayBeAlive) {
            try {
                const outcome = await this.client.cancel(jobId);
                this.logger.info(`Cancelled abandoned job ${jobId} (${outcome})`);
            } catch (err) {
                this.logger.warn(`Could not cancel abandoned job ${jobId}: ${formatErrorMessage(err)}`);
            }
        }
        this.clearState();
    }
}
