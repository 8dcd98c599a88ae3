export type ProxyParseErrorReason = 'invalid_part_count' | 'port_not_a_number';

const MESSAGES: Record<ProxyParseErrorReason, string> = {
    invalid_part_count: 'invalid proxy part amount',
    port_not_a_number: 'proxy port is not a number',
};

export class ProxyParseError extends Error {
    public readonly reason: ProxyParseErrorReason;

    constructor(reason: ProxyParseErrorReason) {
        super(`${ ProxyParseError.name }: ${ MESSAGES[reason] }`);

        this.name = ProxyParseError.name;
        this.reason = reason;
    }
}
