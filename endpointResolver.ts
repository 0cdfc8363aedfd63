import { ResolutionError, formatErrorMessage } from './errors';
import { CallOptions, SlurmClient } from './slurmClient';
import { EndpointAddress, JobId } from './types';

export class EndpointResolver {
    constructor(private readonly client: Pick<SlurmClient, 'queryHost'>) {}

    /**
     * Address of the node running `jobId`. Only meaningful once the job is RUNNING.
     */
    async resolve(jobId: JobId, port: number, options: CallOptions = {}): Promise<EndpointAddress> {
        try {
            const host = await this.client.queryHost(jobId, options);
            return { host, port };
        } catch (err) {
            if (err instanceof ResolutionError) throw err;
            throw new ResolutionError(`No endpoint for job ${jobId}: ${formatErrorMessage(err)}`, err);
        }
    }
}
