import type { Reply } from '../client/MikrotikClient';
import { ResultParser } from '../client/ResultParser';
import type { SentenceAttributes } from '../core/SentenceCodec';
import { toAttributes } from '../utils/Helpers';
import { Logger, silentLogger } from '../utils/Logger';
import { AddressResolver, sameAddress } from './AddressResolver';
import { OvpnUpdateError } from './OvpnUpdateError';

export const OVPN_CLIENT_PATH = '/interface/ovpn-client';

/**
 * The part of a session the updater needs. MikrotikClient satisfies it.
 */
export interface CommandRunner {
    runCommand(command: string, attributes?: SentenceAttributes): Promise<Reply>;
}

export type UpdateOutcome =
    | { status: 'running'; connectTo: string }
    | { status: 'unchanged'; address: string }
    | { status: 'updated'; id: string; previous: string; address: string };

/**
 * Process exit code for an outcome. A VPN that is down while already pointing
 * at the right address cannot be fixed from here, so it counts as a failure.
 * A running VPN exits 0: nothing is wrong, so schedulers and monitoring see
 * no error for the healthy case.
 */
export function exitCodeFor(outcome: UpdateOutcome): number {
    return outcome.status === 'unchanged' ? 1 : 0;
}

/**
 * OvpnIpUpdater
 *
 * Keeps the router's OpenVPN client pointed at a server on a dynamic address:
 * if the tunnel is down and the configured `connect-to` no longer matches
 * what the server's hostname resolves to, the address is rewritten.
 */
export class OvpnIpUpdater {
    constructor(
        private readonly client: CommandRunner,
        private readonly resolver: AddressResolver,
        private readonly logger: Logger = silentLogger
    ) {}

    public async run(vpnHost: string, preferIpv6: boolean = false): Promise<UpdateOutcome> {
        const { id, running, connectTo } = await this.readClientConfig();

        if (running) {
            this.logger.info(`VPN running to ${connectTo}`);
            return { status: 'running', connectTo };
        }

        this.logger.info(`VPN not running to ${connectTo}`);
        const address = await this.resolver.resolve(vpnHost, preferIpv6);

        if (sameAddress(connectTo, address)) {
            this.logger.info('IP is correct, can not fix');
            return { status: 'unchanged', address };
        }

        this.logger.info(`Setting IP to ${address}`);
        const reply = await this.client.runCommand(
            `${OVPN_CLIENT_PATH}/set`,
            toAttributes({ '.id': id, 'connect-to': address })
        );
        this.logger.debug(`Set reply: ${JSON.stringify(reply)}`);

        return { status: 'updated', id, previous: connectTo, address };
    }

    /**
     * Reads the first OpenVPN client configured on the router.
     */
    private async readClientConfig(): Promise<{ id: string; running: boolean; connectTo: string }> {
        const reply = await this.client.runCommand(`${OVPN_CLIENT_PATH}/print`);
        const [record] = ResultParser.records(reply);

        if (!record) {
            throw new OvpnUpdateError('No OpenVPN client is configured on the router');
        }
        if (record.id === undefined) {
            throw new OvpnUpdateError('OpenVPN client record has no .id');
        }

        return {
            id: String(record.id),
            running: record.running === true,
            connectTo: record.connectTo === undefined ? '' : String(record.connectTo)
        };
    }
}
