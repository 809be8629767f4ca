import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildProgram, CliConfig, ConfigError, parseConfig } from './Config';

async function parse(args: string[]): Promise<CliConfig> {
    const captured: CliConfig[] = [];
    const program = buildProgram(async (config) => {
        captured.push(config);
    });
    program.exitOverride();

    await program.parseAsync(args, { from: 'user' });

    expect(captured).toHaveLength(1);
    return captured[0];
}

const ENV_KEYS = ['MIKROTIK_HOST', 'MIKROTIK_PORT', 'MIKROTIK_USER', 'MIKROTIK_PASS', 'OVPN_VPN_HOST'];

describe('CLI configuration', () => {
    const saved = new Map<string, string | undefined>();

    beforeEach(() => {
        for (const key of ENV_KEYS) {
            saved.set(key, process.env[key]);
            delete process.env[key];
        }
    });

    afterEach(() => {
        for (const [key, value] of saved) {
            if (value === undefined) delete process.env[key];
            else process.env[key] = value;
        }
    });

    it('applies the router defaults', async () => {
        expect(await parse(['--vpn-host', 'vpn.example.test'])).toEqual({
            routerHost: '192.168.88.1',
            port: 8728,
            user: 'admin',
            password: '',
            vpnHost: 'vpn.example.test',
            preferIpv6: false,
            verbose: 0
        });
    });

    it('reads the environment and lets flags win over it', async () => {
        process.env.MIKROTIK_HOST = '10.1.1.1';
        process.env.MIKROTIK_PORT = '8000';
        process.env.MIKROTIK_USER = 'ops';
        process.env.MIKROTIK_PASS = 'test-secret';
        process.env.OVPN_VPN_HOST = 'vpn.example.test';

        const config = await parse(['--port', '9000', '--prefer-ipv6', '-vv']);

        expect(config).toEqual({
            routerHost: '10.1.1.1',
            port: 9000,
            user: 'ops',
            password: 'test-secret',
            vpnHost: 'vpn.example.test',
            preferIpv6: true,
            verbose: 2
        });
    });

    it('rejects a missing VPN host and a bad port', () => {
        const error = (() => {
            try {
                parseConfig({
                    routerHost: '192.168.88.1',
                    port: '70000',
                    user: 'admin',
                    password: '',
                    preferIpv6: false,
                    verbose: 0
                });
            } catch (e) {
                return e;
            }
            return null;
        })();

        expect(error).toBeInstanceOf(ConfigError);
        if (!(error instanceof ConfigError)) throw error;
        expect(error.issues).toEqual([
            'port: Number must be less than or equal to 65535',
            'vpnHost: is required (--vpn-host or OVPN_VPN_HOST)'
        ]);
    });
});
