import { JobId, SpawnerState } from './types';

export const STATE_KEY = 'job_id';

/**
 * The one piece of session state that outlives the process: the scheduler's job id.
 */
export class JobIdStore {
    private jobId: JobId = '';

    get(): JobId { return this.jobId; }
    has(): boolean { return this.jobId !== ''; }
    set(jobId: JobId): void { this.jobId = jobId; }
    clear(): void { this.jobId = ''; }

    load(state: SpawnerState): void {
        const value: unknown = state[STATE_KEY];
        this.jobId = typeof value === 'string' ? value.trim() : '';
    }

    toState(): SpawnerState {
        return this.jobId ? { [STATE_KEY]: this.jobId } : {};
    }
}
