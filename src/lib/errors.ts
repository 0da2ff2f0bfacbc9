export class G3Error extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

/** Host unreachable, handshake rejected, request timed out or socket closed. */
export class ConnectionError extends G3Error {}

/** The device answered a request with an error. */
export class DeviceRequestError extends ConnectionError {
    constructor(readonly path: string, readonly code: number | string, message: string) {
        super(`${path}: ${message} (${code})`);
    }
}

export class NotConnectedError extends G3Error {
    constructor(action: string) {
        super(`Cannot ${action}: not connected to a device`);
    }
}

/** The sample stream broke while a session was running. */
export class StreamFault extends G3Error {}

export class RecordingIOError extends G3Error {}

export class ConfigError extends G3Error {}

export function errorMessage(err: unknown) {
    return err instanceof Error ? err.message : String(err);
}
