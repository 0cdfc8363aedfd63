import * as fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const SpawnerConfigSchema = z.object({
    partition: z.string().min(1).default('all'),
    memory: z.string().regex(/^\d+[KMGT]?$/, 'expected a number with optional K/M/G/T suffix').default('200'),
    hours: z.string().regex(/^\d+$/, 'expected whole hours').default('2'),
    jobName: z.string().min(1).default('spawner-jupyterhub'),
    logPath: z.string().min(1).default('/home/{user}/jupyterhub_slurmspawner_%j.log'),
    workdir: z.string().min(1).default('/home/{user}'),
    exportEnv: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/)).default(['JPY_API_TOKEN']),
    startAttempts: z.coerce.number().int().positive().default(15),
    pollIntervalMs: z.coerce.number().int().nonnegative().default(1000),
    commandTimeoutMs: z.coerce.number().int().positive().default(30000),
    stopGraceMs: z.coerce.number().int().nonnegative().default(0),
    sshHost: z.string().default(''),
    sshUser: z.string().default(''),
    sshKeyPath: z.string().default(''),
    logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type SpawnerConfig = z.infer<typeof SpawnerConfigSchema>;
export type LogLevel = SpawnerConfig['logLevel'];

const ENV_PREFIX = 'SLURM_SPAWNER_';

const ENV_KEYS: Record<keyof SpawnerConfig, string> = {
    partition: 'PARTITION', memory: 'MEMORY', hours: 'HOURS', jobName: 'JOB_NAME',
    logPath: 'LOG_PATH', workdir: 'WORKDIR', exportEnv: 'EXPORT_ENV',
    startAttempts: 'START_ATTEMPTS', pollIntervalMs: 'POLL_INTERVAL_MS',
    commandTimeoutMs: 'COMMAND_TIMEOUT_MS', stopGraceMs: 'STOP_GRACE_MS',
    sshHost: 'SSH_HOST', sshUser: 'SSH_USER', sshKeyPath: 'SSH_KEY_PATH', logLevel: 'LOG_LEVEL',
};

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    /** JSON file whose keys match SpawnerConfig */
    file?: string;
    overrides?: Partial<SpawnerConfig>;
}

function readConfigFile(file: string): Record<string, unknown> {
    let raw: string;
    try {
        raw = fs.readFileSync(file, 'utf8');
    } catch (err) {
        throw new ConfigError(`Cannot read config file ${file}`, err);
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new ConfigError(`Config file ${file} is not valid JSON`, err);
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw new ConfigError(`Config file ${file} must contain a JSON object`);
    }
    return { ...parsed };
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const [key, suffix] of Object.entries(ENV_KEYS)) {
        const value = env[ENV_PREFIX + suffix];
        if (value === undefined || value === '') continue;
        values[key] = key === 'exportEnv'
            ? value.split(',').map(v => v.trim()).filter(Boolean)
            : value;
    }
    return values;
}

/**
 * Defaults, then the JSON file, then SLURM_SPAWNER_* variables, then explicit overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): SpawnerConfig {
    const merged = {
        ...(options.file ? readConfigFile(options.file) : {}),
        ...readEnv(options.env ?? process.env),
        ...options.overrides,
    };
    const result = SpawnerConfigSchema.safeParse(merged);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid spawner configuration: ${details}`, result.error);
    }
    return result.data;
}

/**
 * Replace `{user}` placeholders in path templates
 */
export function expandUserPath(template: string, user: string): string {
    return template.split('{user}').join(user);
}
