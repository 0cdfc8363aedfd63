import { SpawnerConfig, expandUserPath } from './config';
import { SessionContext, SubmissionRequest } from './types';

const SAFE_ARG = /^[A-Za-z0-9_\-+=.,:/@%]+$/;

export function quoteArg(arg: string): string {
    if (arg !== '' && SAFE_ARG.test(arg)) return arg;
    return `'${arg.replace(/'/g, "'\\''")}'`;
}

function quoteExportValue(value: string): string {
    return `"${value.replace(/(["\\$`])/g, '\\$1')}"`;
}

export function buildExportLine(keys: readonly string[], env: SessionContext['env']): string {
    const assignments = keys
        .filter(key => env[key] !== undefined)
        .map(key => `${key}=${quoteExportValue(env[key] ?? '')}`);
    return assignments.length ? `export ${assignments.join(' ')}` : '';
}

export function buildSubmissionRequest(config: SpawnerConfig, session: SessionContext): SubmissionRequest {
    return Object.freeze({
        user: session.user,
        command: session.command.map(quoteArg).join(' '),
        exportLine: buildExportLine(config.exportEnv, session.env),
        workdir: expandUserPath(config.workdir, session.user),
        logPath: expandUserPath(config.logPath, session.user),
        partition: config.partition,
        memory: config.memory,
        hours: config.hours,
        jobName: config.jobName,
    });
}

/**
 * sbatch script fed on stdin. `%j` in the log path is expanded by Slurm to the job id.
 */
export function renderJobScript(request: SubmissionRequest): string {
    const lines = [
        '#!/bin/bash',
        `#SBATCH --partition=${request.partition}`,
        `#SBATCH --time=${request.hours}:00:00`,
        `#SBATCH -o ${request.logPath}`,
        `#SBATCH --job-name=${request.jobName}`,
        `#SBATCH --chdir=${request.workdir}`,
        `#SBATCH --mem=${request.memory}`,
        `#SBATCH --uid=${request.user}`,
        '#SBATCH --get-user-env=L',
        '',
    ];
    if (request.exportLine) lines.push(request.exportLine);
    lines.push(request.command, '');
    return lines.join('\n');
}
