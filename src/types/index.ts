export type ProxyFormat = 'host:port:username:password';

export interface Proxy {
    readonly host: string,
    readonly port: number,
    readonly username?: string,
    readonly password?: string,
}
