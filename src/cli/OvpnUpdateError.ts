/**
 * The router or DNS answered, but not with anything the updater can act on.
 */
export class OvpnUpdateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OvpnUpdateError';
        Object.setPrototypeOf(this, OvpnUpdateError.prototype);
    }
}
