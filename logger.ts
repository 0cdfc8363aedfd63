import { LogLevel } from './config';

/**
 * Line sink in the shape of an editor output channel
 */
export interface LogChannel {
    appendLine(line: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createStreamChannel(stream: NodeJS.WritableStream = process.stderr): LogChannel {
    return { appendLine: line => { stream.write(`${line}\n`); } };
}

export class Logger {
    constructor(
        private readonly channel: LogChannel = createStreamChannel(),
        private readonly level: LogLevel = 'info',
        private readonly scope?: string
    ) {}

    /** Logger writing to the same channel with a `[scope]` tag */
    child(scope: string): Logger {
        return new Logger(this.channel, this.level, this.scope ? `${this.scope}:${scope}` : scope);
    }

    debug(msg: string): void { this.write('debug', msg); }
    info(msg: string): void { this.write('info', msg); }
    warn(msg: string): void { this.write('warn', msg); }
    error(msg: string): void { this.write('error', msg); }

    private write(level: LogLevel, msg: string): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
        const tag = this.scope ? ` [${this.scope}]` : '';
        this.channel.appendLine(`[${new Date().toISOString()}] ${level.toUpperCase()}${tag} ${msg}`);
    }
}
