import { isIP } from 'net';
import { CommandRunner } from './commandRunner';
import { NotFoundError, ResolutionError, SubmissionError } from './errors';
import { renderJobScript } from './jobScript';
import { Logger } from './logger';
import { CancelOutcome, JobId, SchedulerState, SlurmStateLabel, SubmissionRequest } from './types';

export const JOB_ID_PATTERN = /^\d+(_\d+)?$/;

const TERMINAL_LABELS: SlurmStateLabel[] = ['COMPLETED', 'FAILED', 'COMPLETING', 'TIMEOUT'];
const GONE_PATTERN = /already completing or completed|Invalid job id/i;

export type UnixSignal = 'INT' | 'TERM' | 'KILL';

export interface CallOptions {
    signal?: AbortSignal;
}

export interface CancelOptions extends CallOptions {
    /** Deliver this signal to every step instead of cancelling the job */
    sendSignal?: UnixSignal;
}

export function isValidJobId(id: string): boolean {
    return JOB_ID_PATTERN.test(id);
}

function lastToken(text: string): string {
    const tokens = text.trim().split(/\s+/);
    return tokens[tokens.length - 1] ?? '';
}

/**
 * Coarse state from `squeue -o %T` output. RUNNING wins over PENDING; unknown text is terminal.
 */
export function deriveJobState(output: string): SchedulerState {
    const text = output.trim();
    if (!text) return 'UNSUBMITTED';
    if (text.includes('RUNNING')) return 'RUNNING';
    if (text.includes('PENDING')) return 'PENDING';
    return 'TERMINAL';
}

export class SlurmClient {
    constructor(private readonly runner: CommandRunner, private readonly logger: Logger) {}

    public async submit(request: SubmissionRequest, options: CallOptions = {}): Promise<JobId> {
        const script = renderJobScript(request);
        this.logger.info(`Submitting job ${request.jobName} for user ${request.user} on partition ${request.partition}`);
        this.logger.debug(`sbatch script:\n${script}`);

        const result = await this.runner.run('sbatch', { input: script, signal: options.signal });
        if (!result.success) {
            throw new SubmissionError(`Failed to submit job: ${result.stderr}`, result.stdout || result.stderr);
        }

        // e.g. "Submitted batch job 209"
        const jobId = lastToken(result.stdout);
        if (!isValidJobId(jobId)) {
            throw new SubmissionError(`Unexpected sbatch output: ${result.stdout || '(empty)'}`, result.stdout);
        }
        this.logger.info(`Job submitted successfully: ${jobId}`);
        return jobId;
    }

    public async queryState(jobId: JobId, options: CallOptions = {}): Promise<SchedulerState> {
        // squeue without -j lists every job, so never query an empty id
        if (!jobId) return 'UNSUBMITTED';
        if (!isValidJobId(jobId)) {
            this.logger.warn(`Ignoring malformed job id ${JSON.stringify(jobId)}`);
            return 'UNSUBMITTED';
        }

        const result = await this.runner.run(`squeue -h -j ${jobId} -o %T`, options);
        const output = result.success ? result.stdout : '';
        this.logger.info(`Slurm job ${jobId} status: ${output || '(none)'}`);
        return deriveJobState(output);
    }

    public async queryNode(jobId: JobId, options: CallOptions = {}): Promise<string> {
        if (!isValidJobId(jobId)) throw new NotFoundError(jobId);
        const result = await this.runner.run(`squeue -h -j ${jobId} -o %N`, options);
        const node = result.success ? result.stdout.trim() : '';
        if (!node) throw new NotFoundError(jobId);
        return node;
    }

    public async resolveAddress(node: string, options: CallOptions = {}): Promise<string> {
        if (!node) throw new ResolutionError('Cannot resolve an empty node name');
        const result = await this.runner.run(`host ${node}`, options);
        if (!result.success) {
            throw new ResolutionError(`Name lookup for ${node} failed: ${result.stderr || result.stdout}`);
        }
        // e.g. "node01.cluster has address 10.1.2.3"
        const address = lastToken(result.stdout);
        if (!isIP(address)) {
            throw new ResolutionError(`Name lookup for ${node} returned no address: ${result.stdout || '(empty)'}`);
        }
        return address;
    }

    public async queryHost(jobId: JobId, options: CallOptions = {}): Promise<string> {
        const node = await this.queryNode(jobId, options);
        return this.resolveAddress(node, options);
    }

    public async cancel(jobId: JobId, options: CancelOptions = {}): Promise<CancelOutcome> {
        if (!isValidJobId(jobId)) return 'already-terminal';

        const flags = options.sendSignal ? `--signal=${options.sendSignal} --full ` : '';
        const result = await this.runner.run(`scancel ${flags}${jobId}`, { signal: options.signal });
        const tokens = result.stdout.split(/\s+/);

        if (tokens.includes('CANCELLED')) return 'cancelled';
        if (tokens.some(t => TERMINAL_LABELS.includes(t)) || GONE_PATTERN.test(result.stderr)) {
            return 'already-terminal';
        }
        if (!result.success && result.stderr) {
            this.logger.warn(`scancel ${jobId} failed: ${result.stderr}`);
        }
        return 'unknown';
    }
}
