/**
 * CLI configuration.
 *
 * Priority:
 * 1. Command-line flags
 * 2. Environment variables (a `.env` file is loaded into the environment first)
 * 3. Default values (the RouterOS factory defaults)
 */
import * as dotenv from 'dotenv';
import { Command, Option, OptionValues } from 'commander';
import { z } from 'zod';

export const CLI_NAME = 'ovpn-ip-updater';

export const CliConfigSchema = z.object({
    routerHost: z.string().min(1, 'router host must not be empty'),
    port: z.coerce.number().int().min(1).max(65535),
    user: z.string().min(1, 'user must not be empty'),
    password: z.string(),
    vpnHost: z
        .string({ required_error: 'is required (--vpn-host or OVPN_VPN_HOST)' })
        .min(1, 'is required (--vpn-host or OVPN_VPN_HOST)'),
    preferIpv6: z.boolean(),
    verbose: z.number().int().min(0)
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
        this.name = 'ConfigError';
        Object.setPrototypeOf(this, ConfigError.prototype);
    }
}

/**
 * Loads `.env` from the working directory. Variables already set in the
 * environment are left untouched.
 */
export function loadEnvFile(): void {
    dotenv.config();
}

export function parseConfig(raw: OptionValues): CliConfig {
    const result = CliConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }
    return result.data;
}

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1;
}

/**
 * Builds the command-line program. `handler` receives the validated configuration.
 */
export function buildProgram(handler: (config: CliConfig) => Promise<void>): Command {
    const program = new Command();

    program
        .name(CLI_NAME)
        .description('Point the RouterOS OpenVPN client at the current address of the VPN server')
        .version('1.0.0')
        .addOption(new Option('--router-host <host>', 'hostname or IP of the router')
            .env('MIKROTIK_HOST')
            .default('192.168.88.1'))
        .addOption(new Option('--port <port>', 'API port to use')
            .env('MIKROTIK_PORT')
            .default(8728))
        .addOption(new Option('--user <user>', 'user to authenticate with')
            .env('MIKROTIK_USER')
            .default('admin'))
        .addOption(new Option('--password <password>', 'password to authenticate with')
            .env('MIKROTIK_PASS')
            .default(''))
        .addOption(new Option('--vpn-host <host>', 'hostname of the VPN server to resolve')
            .env('OVPN_VPN_HOST'))
        .option('--prefer-ipv6', 'use the IPv6 address of the VPN server', false)
        .option('-v, --verbose', 'increase log verbosity (repeatable)', increaseVerbosity, 0)
        .action(async (options: OptionValues) => {
            await handler(parseConfig(options));
        });

    return program;
}
