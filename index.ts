export * from './types';
export * from './errors';
export { SpawnerConfigSchema, loadConfig, expandUserPath } from './config';
export type { SpawnerConfig, LogLevel, LoadConfigOptions } from './config';
export { Logger, createStreamChannel } from './logger';
export type { LogChannel } from './logger';
export { ShellCommandRunner } from './commandRunner';
export type { CommandRunner, ShellRunnerConfig } from './commandRunner';
export { renderJobScript, buildSubmissionRequest, quoteArg } from './jobScript';
export { SlurmClient, deriveJobState, isValidJobId, JOB_ID_PATTERN } from './slurmClient';
export { JobIdStore, STATE_KEY } from './jobIdStore';
export { EndpointResolver } from './endpointResolver';
export { SubmissionQueue } from './submissionQueue';
export { SlurmSpawner } from './slurmSpawner';
export type { SlurmSpawnerDeps, Sleep } from './slurmSpawner';
export { createSpawner, buildCli } from './cli';
