/**
 * Unit tests for SlurmClient
 */

import { NotFoundError, ResolutionError, SubmissionError } from '../errors';
import { Logger } from '../logger';
import { SlurmClient, deriveJobState } from '../slurmClient';
import { SubmissionRequest } from '../types';
import {
    MOCK_HOST_OUTPUT, MOCK_SBATCH_OUTPUT, MOCK_SCANCEL_OUTPUT, MOCK_SQUEUE_NODE, MOCK_SQUEUE_STATE,
    MemoryChannel, ScriptedRunner
} from './__mocks__/slurmCommands';

const request: SubmissionRequest = {
    user: 'alice',
    command: 'jupyterhub-singleuser --port=8888',
    exportLine: 'export JPY_API_TOKEN="test-token"',
    workdir: '/home/alice',
    logPath: '/home/alice/jupyterhub_slurmspawner_%j.log',
    partition: 'gpu',
    memory: '4000',
    hours: '4',
    jobName: 'spawner-jupyterhub'
};

describe('deriveJobState', () => {
    it('should map scheduler output to coarse states', () => {
        const cases: [string, string][] = [
            ['PENDING', 'PENDING'],
            ['RUNNING', 'RUNNING'],
            ['', 'UNSUBMITTED'],
            ['   ', 'UNSUBMITTED'],
            ['CANCELLED', 'TERMINAL'],
            ['COMPLETED', 'TERMINAL'],
            ['FAILED', 'TERMINAL'],
            ['COMPLETING', 'TERMINAL'],
            ['SUSPENDED', 'TERMINAL'],
            ['something unexpected', 'TERMINAL']
        ];
        for (const [output, expected] of cases) {
            expect(deriveJobState(output)).toBe(expected);
        }
    });

    it('should prefer RUNNING when both labels appear', () => {
        expect(deriveJobState('PENDING\nRUNNING')).toBe('RUNNING');
    });
});

describe('SlurmClient', () => {
    let runner: ScriptedRunner;
    let client: SlurmClient;

    beforeEach(() => {
        runner = new ScriptedRunner();
        client = new SlurmClient(runner, new Logger(new MemoryChannel(), 'debug'));
    });

    describe('submit', () => {
        it('should pipe the job script to sbatch and return the job ID', async () => {
            runner.on('sbatch', { stdout: MOCK_SBATCH_OUTPUT.success });

            const jobId = await client.submit(request);

            expect(jobId).toBe('12349');
            expect(runner.calls).toHaveLength(1);
            expect(runner.calls[0].command).toBe('sbatch');
            expect(runner.calls[0].input).toContain('#SBATCH --partition=gpu\n');
            expect(runner.calls[0].input).toContain('jupyterhub-singleuser --port=8888\n');
        });

        it('should accept array job IDs', async () => {
            runner.on('sbatch', { stdout: MOCK_SBATCH_OUTPUT.array });
            await expect(client.submit(request)).resolves.toBeValidJobId();
        });

        it('should reject output that does not end in a job ID', async () => {
            runner.on('sbatch', { stdout: 'sbatch: submitted to queue' });

            const error = await client.submit(request).catch((err: unknown) => err);

            expect(error).toBeInstanceOf(SubmissionError);
            expect((error as SubmissionError).message).toBe('Unexpected sbatch output: sbatch: submitted to queue');
            expect((error as SubmissionError).output).toBe('sbatch: submitted to queue');
        });

        it('should reject empty output', async () => {
            runner.on('sbatch', { stdout: '' });
            await expect(client.submit(request)).rejects.toThrow('Unexpected sbatch output: (empty)');
        });

        it('should surface sbatch errors', async () => {
            runner.on('sbatch', { success: false, stderr: MOCK_SBATCH_OUTPUT.error.invalidPartition });

            await expect(client.submit(request)).rejects.toThrow(SubmissionError);
            await expect(client.submit(request)).rejects.toThrow('Failed to submit job: sbatch: error: invalid partition specified');
        });
    });

    describe('queryState', () => {
        it('should not invoke squeue without a job ID', async () => {
            expect(await client.queryState('')).toBe('UNSUBMITTED');
            expect(runner.calls).toHaveLength(0);
        });

        it('should query squeue scoped to the job', async () => {
            runner.on('-o %T', { stdout: MOCK_SQUEUE_STATE.running });

            expect(await client.queryState('12349')).toBe('RUNNING');
            expect(runner.commands()).toEqual(['squeue -h -j 12349 -o %T']);
        });

        it('should treat a failed squeue as an unknown job', async () => {
            runner.on('-o %T', { success: false, stderr: MOCK_SQUEUE_STATE.invalidJob });
            expect(await client.queryState('12349')).toBe('UNSUBMITTED');
        });

        it('should refuse to interpolate malformed IDs', async () => {
            expect(await client.queryState('1; rm -rf /')).toBe('UNSUBMITTED');
            expect(runner.calls).toHaveLength(0);
        });
    });

    describe('queryHost', () => {
        it('should look up the node and resolve it to an address', async () => {
            runner
                .on('-o %N', { stdout: MOCK_SQUEUE_NODE.assigned })
                .on('host ', { stdout: MOCK_HOST_OUTPUT.found });

            expect(await client.queryHost('12349')).toBe('10.20.30.41');
            expect(runner.commands()).toEqual(['squeue -h -j 12349 -o %N', 'host node01']);
        });

        it('should fail with NotFoundError when no node is assigned', async () => {
            runner.on('-o %N', { stdout: MOCK_SQUEUE_NODE.none });
            await expect(client.queryHost('12349')).rejects.toThrow(NotFoundError);
            expect(runner.count('host ')).toBe(0);
        });

        it('should fail with ResolutionError when the lookup has no address', async () => {
            runner
                .on('-o %N', { stdout: MOCK_SQUEUE_NODE.assigned })
                .on('host ', { stdout: MOCK_HOST_OUTPUT.notFound });

            await expect(client.queryHost('12349')).rejects.toThrow(
                'Name lookup for node01 returned no address: Host node01 not found: 3(NXDOMAIN)'
            );
        });

        it('should fail with ResolutionError when host exits non-zero', async () => {
            runner
                .on('-o %N', { stdout: MOCK_SQUEUE_NODE.assigned })
                .on('host ', { success: false, stdout: MOCK_HOST_OUTPUT.notFound });

            await expect(client.queryHost('12349')).rejects.toThrow(ResolutionError);
        });
    });

    describe('cancel', () => {
        it('should run scancel for the job', async () => {
            runner.on('scancel', { stdout: MOCK_SCANCEL_OUTPUT.success });

            expect(await client.cancel('12349')).toBe('unknown');
            expect(runner.commands()).toEqual(['scancel 12349']);
        });

        it('should map terminal labels', async () => {
            runner.on('scancel', { stdout: 'CANCELLED' }, { stdout: 'COMPLETED' }, { stdout: 'COMPLETING' });

            expect(await client.cancel('12349')).toBe('cancelled');
            expect(await client.cancel('12349')).toBe('already-terminal');
            expect(await client.cancel('12349')).toBe('already-terminal');
        });

        it('should recognise jobs that already finished', async () => {
            runner.on('scancel', { success: false, stderr: MOCK_SCANCEL_OUTPUT.alreadyDone });
            expect(await client.cancel('12349')).toBe('already-terminal');
        });

        it('should signal every step when asked to', async () => {
            runner.on('scancel', { stdout: '' });

            await client.cancel('12349', { sendSignal: 'TERM' });

            expect(runner.commands()).toEqual(['scancel --signal=TERM --full 12349']);
        });
    });
});
