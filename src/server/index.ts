import bodyParser from 'body-parser';
import express, { type Express, type RequestHandler } from 'express';
import type { Server as HttpServer } from 'http';
import { Logger } from '~/logger';
import type { HttpMethod } from '~/server/types';

function boundPort(server: HttpServer): number {
    const address = server.address();

    if (address === null || typeof address === 'string') throw new Error('server is not bound to a TCP port');

    return address.port;
}

export class Server {
    private readonly _instance: Express;
    private _logger: Logger;
    private _server: HttpServer | undefined;
    private readonly _port: number;

    constructor(port: number) {
        this._instance = express();
        this._logger = new Logger('Server');
        this._port = port;

        this._instance.use(bodyParser.json({ limit: '10mb' }));
    }

    public get isStarted(): boolean {
        return this._server !== undefined;
    }

    /**
     * Resolves the port actually bound, which differs from the configured one when that is 0.
     */
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            if (this._server) {
                resolve(boundPort(this._server));
                return;
            }

            const server = this._instance.listen(this._port, () => {
                const port = boundPort(server);

                this._logger.log(`The server is running on port ${ Logger.makeUnderline(port.toString()) }`);
                resolve(port);
            });

            server.once('error', reject);
            this._server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            const server = this._server;

            if (!server) {
                resolve();
                return;
            }

            this._server = undefined;

            server.close((e) => {
                if (e) reject(e);
                else resolve();
            });
            server.closeAllConnections();
        });
    }

    public addEndpoint(path: string, method: HttpMethod, handler: RequestHandler) {
        this._instance[method](path, handler);
        this._logger.log(`Endpoint <${ method.toUpperCase() }> ${ path } enabled`);
    }
}
