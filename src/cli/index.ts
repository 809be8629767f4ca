#!/usr/bin/env node

import { MikrotikClient } from '../client/MikrotikClient';
import { createLogger, Logger } from '../utils/Logger';
import { AddressResolver, systemLookup } from './AddressResolver';
import { buildProgram, CLI_NAME, CliConfig, loadEnvFile } from './Config';
import { exitCodeFor, OvpnIpUpdater } from './OvpnIpUpdater';

async function update(config: CliConfig, logger: Logger): Promise<number> {
    const client = new MikrotikClient({
        host: config.routerHost,
        port: config.port,
        user: config.user,
        password: config.password,
        logger
    });

    logger.info('Checking VPN');
    await client.connect();

    try {
        const updater = new OvpnIpUpdater(client, new AddressResolver(systemLookup, logger), logger);
        const outcome = await updater.run(config.vpnHost, config.preferIpv6);
        return exitCodeFor(outcome);
    } finally {
        client.close();
    }
}

async function main(argv: string[]): Promise<number> {
    loadEnvFile();

    let exitCode = 1;
    const program = buildProgram(async (config) => {
        const logger = createLogger(CLI_NAME, config.verbose);
        try {
            exitCode = await update(config, logger);
        } catch (error) {
            logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
            exitCode = 1;
        }
    });

    await program.parseAsync(argv);
    return exitCode;
}

main(process.argv).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        createLogger(CLI_NAME).error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
);
