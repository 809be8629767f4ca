/**
 * ros-ovpn-updater
 * ==========================================
 * A RouterOS API session client for Node.js, and the OpenVPN endpoint
 * updater built on top of it.
 *
 * @packageDocumentation
 */

// ===============================================
// 1. SESSION (Primary Entry Point)
// ===============================================

/**
 * One authenticated API session: connect(), runCommand(), close().
 */
export { MikrotikClient } from './client/MikrotikClient';
export type { MikrotikOptions, Reply } from './client/MikrotikClient';

/**
 * Turns `!re` sentences into plain objects with typed values.
 */
export { ResultParser } from './client/ResultParser';
export type { ParsedRecord, RecordValue } from './client/ResultParser';

// ===============================================
// 2. ERRORS
// ===============================================

export {
    RosError,
    RosTransportError,
    RosFramingError,
    RosAuthError,
    RosTrapError,
    RosSessionError
} from './core/RosError';
export type { RosErrorKind } from './core/RosError';

// ===============================================
// 3. LOW-LEVEL COMPONENTS
// ===============================================

export { SocketClient } from './core/SocketClient';
export type { SocketClientOptions } from './core/SocketClient';
export { RosProtocol, MAX_WORD_LENGTH } from './core/RosProtocol';
export type { DecodedLength } from './core/RosProtocol';
export { SentenceCodec, ReplyMarker } from './core/SentenceCodec';
export type { Sentence, SentenceAttributes, WordTransport } from './core/SentenceCodec';
export { Auth } from './core/Auth';

// ===============================================
// 4. UTILITIES
// ===============================================

export { silentLogger } from './utils/Logger';
export type { Logger } from './utils/Logger';
export * from './utils/Helpers';

// ===============================================
// 5. OPENVPN ENDPOINT UPDATER
// ===============================================

export { OvpnIpUpdater, exitCodeFor, OVPN_CLIENT_PATH } from './cli/OvpnIpUpdater';
export type { CommandRunner, UpdateOutcome } from './cli/OvpnIpUpdater';
export { AddressResolver, pickAddress, sameAddress, systemLookup } from './cli/AddressResolver';
export type { LookupFn } from './cli/AddressResolver';
export { OvpnUpdateError } from './cli/OvpnUpdateError';
