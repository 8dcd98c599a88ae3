export type ProbeErrorKind = 'transport' | 'gate' | 'unknown' | 'canceled';

/**
 * Why a single probe failed. Delivered inside an outcome, never thrown across the result stream.
 */
export abstract class ProbeError extends Error {
    public abstract readonly kind: ProbeErrorKind;

    protected constructor(message: string, cause?: unknown) {
        super(`${ new.target.name }: ${ message }`, { cause });

        this.name = new.target.name;
    }
}

export class TransportError extends ProbeError {
    public readonly kind = 'transport';
    public readonly timedOut: boolean = false;

    // ECONNREFUSED, ENOTFOUND, ...
    public readonly code: string | undefined;

    constructor(message: string, cause?: unknown, code?: string) {
        super(message, cause);

        this.code = code;
    }
}

export class ProbeTimeoutError extends TransportError {
    public override readonly timedOut = true;
    public readonly timeout: number;

    constructor(timeout: number, cause?: unknown) {
        super(`no response within ${ timeout }ms`, cause, 'ETIMEDOUT');

        this.timeout = timeout;
    }
}

export class GateError extends ProbeError {
    public readonly kind = 'gate';

    constructor(cause: unknown) {
        super('concurrency gate was torn down while waiting for a permit', cause);
    }
}

// A probe that rejected instead of resolving a result.
export class UnknownProbeError extends ProbeError {
    public readonly kind = 'unknown';

    constructor(cause?: unknown) {
        super('some unknown error happened', cause);
    }
}

export class CanceledProbeError extends ProbeError {
    public readonly kind = 'canceled';

    constructor() {
        super('probe aborted by the consumer');
    }
}

export class GateClosedError extends Error {
    constructor() {
        super(`${ GateClosedError.name }: semaphore is closed`);

        this.name = GateClosedError.name;
    }
}

export class ConfigError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`${ ConfigError.name }: ${ issues.join('; ') }`);

        this.name = ConfigError.name;
        this.issues = issues;
    }
}

export class CampaignStateError extends Error {
    constructor(message: string) {
        super(`${ CampaignStateError.name }: ${ message }`);

        this.name = CampaignStateError.name;
    }
}
