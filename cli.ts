#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { ShellCommandRunner } from './commandRunner';
import { SpawnerConfig, loadConfig } from './config';
import { formatErrorMessage } from './errors';
import { buildSubmissionRequest, renderJobScript } from './jobScript';
import { LogChannel, Logger, createStreamChannel } from './logger';
import { SlurmClient } from './slurmClient';
import { SlurmSpawner } from './slurmSpawner';
import { SubmissionQueue } from './submissionQueue';
import { SessionContext, Spawner, SpawnerState } from './types';

const DEFAULT_STATE_FILE = '.slurm-spawner-state.json';

const StateFileSchema = z.object({ job_id: z.string().optional() });

export interface CliDeps {
    env?: NodeJS.ProcessEnv;
    out?: LogChannel;
    log?: LogChannel;
    createSpawner?: (config: SpawnerConfig, logger: Logger) => Spawner;
}

type GlobalOptions = {
    config?: string;
    state: string;
};

function parsePort(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new InvalidArgumentError('expected a port between 1 and 65535');
    }
    return port;
}

/**
 * A missing, corrupt or unrecognised state file reads as "no job".
 */
export function readStateFile(file: string, logger?: Logger): SpawnerState {
    if (!fs.existsSync(file)) return {};
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
        logger?.warn(`Ignoring unreadable state file ${file}: ${formatErrorMessage(err)}`);
        return {};
    }
    const parsed = StateFileSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
}

export function writeStateFile(file: string, state: SpawnerState): void {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(state, null, 2)}\n`);
}

export function createSpawner(config: SpawnerConfig, logger: Logger, queue = new SubmissionQueue(1)): SlurmSpawner {
    const runner = new ShellCommandRunner({
        timeoutMs: config.commandTimeoutMs,
        sshHost: config.sshHost,
        sshUser: config.sshUser,
        sshKeyPath: config.sshKeyPath,
    }, logger.child('exec'));
    const client = new SlurmClient(runner, logger.child('slurm'));
    return new SlurmSpawner({ client, queue, config, logger });
}

export function buildCli(deps: CliDeps = {}): Command {
    const env = deps.env ?? process.env;
    const out = deps.out ?? createStreamChannel(process.stdout);
    const logChannel = deps.log ?? createStreamChannel(process.stderr);
    const makeSpawner = deps.createSpawner ?? ((config: SpawnerConfig, logger: Logger) => createSpawner(config, logger));
    const program = new Command();

    program
        .name('slurm-spawner')
        .description('Run a single-user server as a Slurm batch job')
        .option('-c, --config <file>', 'JSON config file')
        .option('-s, --state <file>', 'session state file', DEFAULT_STATE_FILE);

    const setup = () => {
        const globals = program.opts<GlobalOptions>();
        const config = loadConfig({ env, file: globals.config });
        const logger = new Logger(logChannel, config.logLevel);
        const spawner = makeSpawner(config, logger);
        spawner.loadState(readStateFile(globals.state, logger));
        return { spawner, save: () => writeStateFile(globals.state, spawner.getState()) };
    };

    const sessionFrom = (user: string, port: number, command: string[]): SessionContext => ({
        user, port, command, env,
    });

    program
        .command('start')
        .description('submit the job and wait until it runs')
        .requiredOption('-u, --user <name>', 'user the job runs as', env.USER)
        .requiredOption('-p, --port <port>', 'port the server listens on', parsePort)
        .argument('<command...>', 'server command line')
        .action(async (command: string[], opts: { user: string; port: number }) => {
            const { spawner, save } = setup();
            const result = await spawner.start(sessionFrom(opts.user, opts.port, command));
            save();
            if (result.ok) {
                out.appendLine(`${result.endpoint.host}:${result.endpoint.port}`);
            } else {
                out.appendLine(`server failed to start: ${result.error.message}`);
                process.exitCode = 1;
            }
        });

    program
        .command('poll')
        .description('report whether the job is still alive')
        .action(async () => {
            const { spawner, save } = setup();
            const status = await spawner.poll();
            save();
            out.appendLine(status);
            if (status !== 'alive') process.exitCode = 1;
        });

    program
        .command('stop')
        .description('cancel the job')
        .option('--now', 'skip the SIGTERM grace period', false)
        .action(async (opts: { now: boolean }) => {
            const { spawner, save } = setup();
            await spawner.stop(opts.now);
            save();
        });

    program
        .command('script')
        .description('print the sbatch script without submitting it')
        .requiredOption('-u, --user <name>', 'user the job runs as', env.USER)
        .argument('<command...>', 'server command line')
        .action((command: string[], opts: { user: string }) => {
            const config = loadConfig({ env, file: program.opts<GlobalOptions>().config });
            out.appendLine(renderJobScript(buildSubmissionRequest(config, sessionFrom(opts.user, 0, command))));
        });

    return program;
}

if (require.main === module) {
    buildCli().parseAsync(process.argv).catch((err: unknown) => {
        process.stderr.write(`${formatErrorMessage(err)}\n`);
        process.exitCode = 1;
    });
}
