/**
 * SLURM job state labels as printed by `squeue -o %T` and `scancel`
 * See: https://slurm.schedmd.com/squeue.html#SECTION_JOB-STATE-CODES
 */
export type SlurmStateLabel =
    | 'PENDING'      // PD - Job is awaiting resource allocation
    | 'RUNNING'      // R  - Job currently has an allocation
    | 'COMPLETING'   // CG - Job is in the process of completing
    | 'COMPLETED'    // CD - Job has terminated all processes on all nodes
    | 'CANCELLED'    // CA - Job was explicitly cancelled
    | 'FAILED'       // F  - Job terminated with non-zero exit code
    | 'TIMEOUT'      // TO - Job terminated upon reaching its time limit
    | string;        // Allow unknown states

/**
 * Opaque job identifier assigned by sbatch. Empty string means no job.
 */
export type JobId = string;

/**
 * Coarse job state derived from scheduler output on every query; never stored.
 */
export type SchedulerState = 'UNSUBMITTED' | 'PENDING' | 'RUNNING' | 'TERMINAL';

export type CancelOutcome = 'cancelled' | 'already-terminal' | 'unknown';

export type LifecyclePhase = 'idle' | 'submitting' | 'awaiting-run' | 'running' | 'stopping';

export interface CommandResult {
    success: boolean;
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface CommandOptions {
    /** Written to the command's standard input */
    input?: string;
    signal?: AbortSignal;
}

/**
 * Everything sbatch needs for one submission. Built once per start() and consumed once.
 */
export type SubmissionRequest = Readonly<{
    user: string;
    /** Full user command, already quoted for bash */
    command: string;
    /** `export K="v"` line placed before the command, may be empty */
    exportLine: string;
    workdir: string;
    logPath: string;
    partition: string;
    memory: string;
    hours: string;
    jobName: string;
}>;

export interface EndpointAddress {
    host: string;
    port: number;
}

/**
 * Per-start input from the session manager
 */
export interface SessionContext {
    user: string;
    port: number;
    /** argv of the single-user process */
    command: string[];
    env: Record<string, string | undefined>;
}

/**
 * Persisted session blob. Only the job id survives restarts.
 */
export interface SpawnerState {
    job_id?: string;
}

export type PollStatus = 'alive' | 'not-running';

export type StartResult =
    | { ok: true; jobId: JobId; endpoint: EndpointAddress }
    | { ok: false; error: Error };

export interface StartOptions {
    signal?: AbortSignal;
}

/**
 * Surface the session manager holds every spawner by
 */
export interface Spawner {
    start(session: SessionContext, options?: StartOptions): Promise<StartResult>;
    poll(): Promise<PollStatus>;
    stop(now?: boolean): Promise<void>;
    loadState(state: SpawnerState): void;
    getState(): SpawnerState;
    clearState(): void;
}
