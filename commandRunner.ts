import { exec, ExecException } from 'child_process';
import { CommandOptions, CommandResult } from './types';
import { Logger } from './logger';

export interface CommandRunner {
    run(command: string, options?: CommandOptions): Promise<CommandResult>;
}

export interface ShellRunnerConfig {
    timeoutMs: number;
    sshHost?: string;
    sshUser?: string;
    sshKeyPath?: string;
}

/**
 * Runs scheduler commands through the shell, locally or on a login node over ssh.
 * Never rejects: spawn errors, timeouts and non-zero exits come back as `success: false`.
 */
export class ShellCommandRunner implements CommandRunner {
    constructor(private readonly config: ShellRunnerConfig, private readonly logger: Logger) {}

    run(command: string, options: CommandOptions = {}): Promise<CommandResult> {
        const fullCommand = this.buildCommand(command);
        this.logger.debug(`Executing: ${fullCommand}`);
        return new Promise(resolve => {
            const child = exec(
                fullCommand,
                { encoding: 'utf8', maxBuffer: 10 * 1024 * 1024, timeout: this.config.timeoutMs, signal: options.signal },
                (error: ExecException | null, stdout: string, stderr: string) => {
                    if (error) {
                        this.logger.debug(`Command failed: ${error.message}`);
                        resolve({
                            success: false,
                            stdout: stdout.trim(),
                            stderr: stderr.trim() || error.message,
                            exitCode: typeof error.code === 'number' ? error.code : 1,
                        });
                        return;
                    }
                    resolve({ success: true, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 });
                }
            );
            if (options.input !== undefined && child.stdin) {
                child.stdin.on('error', err => this.logger.debug(`stdin closed early: ${err.message}`));
                child.stdin.end(options.input);
            }
        });
    }

    buildCommand(command: string): string {
        if (!this.config.sshHost) return command;
        const args = ['ssh'];
        if (this.config.sshKeyPath) args.push('-i', this.config.sshKeyPath);
        args.push('-o', 'BatchMode=yes', '-o', 'StrictHostKeyChecking=accept-new', '-o', 'ConnectTimeout=10');
        args.push(this.config.sshUser ? `${this.config.sshUser}@${this.config.sshHost}` : this.config.sshHost);
        args.push(`'${command.replace(/'/g, "'\\''")}'`);
        return args.join(' ');
    }
}
