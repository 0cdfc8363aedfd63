export type SpawnerErrorCode =
    | 'SUBMISSION_FAILED'
    | 'POLL_TIMEOUT'
    | 'JOB_FAILED'
    | 'NOT_FOUND'
    | 'RESOLUTION_FAILED'
    | 'CANCEL_UNCONFIRMED'
    | 'SPAWNER_BUSY'
    | 'START_ABORTED'
    | 'CONFIG_INVALID';

export class SpawnerError extends Error {
    constructor(
        message: string,
        public readonly code: SpawnerErrorCode,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'SpawnerError';
    }
}

/** sbatch failed or printed something that is not a job id */
export class SubmissionError extends SpawnerError {
    constructor(message: string, public readonly output: string, cause?: unknown) {
        super(message, 'SUBMISSION_FAILED', cause);
        this.name = 'SubmissionError';
    }
}

export class PollTimeout extends SpawnerError {
    constructor(public readonly jobId: string, public readonly attempts: number) {
        super(`Job ${jobId} did not reach RUNNING after ${attempts} state queries`, 'POLL_TIMEOUT');
        this.name = 'PollTimeout';
    }
}

export class JobFailed extends SpawnerError {
    constructor(public readonly jobId: string, public readonly state: string) {
        super(`Job ${jobId} failed to start (state: ${state || 'gone'})`, 'JOB_FAILED');
        this.name = 'JobFailed';
    }
}

export class NotFoundError extends SpawnerError {
    constructor(public readonly jobId: string) {
        super(`Job ${jobId} has no execution node`, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

export class ResolutionError extends SpawnerError {
    constructor(message: string, cause?: unknown) {
        super(message, 'RESOLUTION_FAILED', cause);
        this.name = 'ResolutionError';
    }
}

export class CancelUnconfirmed extends SpawnerError {
    constructor(public readonly jobId: string) {
        super(`Job ${jobId} never cancelled`, 'CANCEL_UNCONFIRMED');
        this.name = 'CancelUnconfirmed';
    }
}

export class SpawnerBusyError extends SpawnerError {
    constructor(public readonly phase: string) {
        super(`start() called while spawner is ${phase}`, 'SPAWNER_BUSY');
        this.name = 'SpawnerBusyError';
    }
}

export class StartAborted extends SpawnerError {
    constructor(public readonly jobId: string) {
        super(`Start of job ${jobId || '(unsubmitted)'} was aborted`, 'START_ABORTED');
        this.name = 'StartAborted';
    }
}

export class ConfigError extends SpawnerError {
    constructor(message: string, cause?: unknown) {
        super(message, 'CONFIG_INVALID', cause);
        this.name = 'ConfigError';
    }
}

export function formatErrorMessage(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error);
    } catch {
        return String(error);
    }
}
