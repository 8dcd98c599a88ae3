import chalk from 'chalk';
import { inspect } from 'util';

type Paint = (text: string) => string;

export class Logger {
    protected static _chalk: chalk.Chalk = new chalk.Instance({ level: 1 });
    private static _silent = false;

    private readonly _location_value: string;

    protected get _location(): string {
        return this._location_value;
    }

    protected _previousLocations: string[];

    protected get _fullLocation(): string[] {
        return this._previousLocations.concat(this._location);
    }

    constructor(location: string, previousLocations: string[] = []) {
        this._location_value = location;
        this._previousLocations = previousLocations;
    }

    public static makeUnderline(message: string): string {
        return Logger._chalk.underline(message);
    }

    public static setSilent(silent: boolean): void {
        Logger._silent = silent;
    }

    public createChild(location: string): Logger {
        return new Logger(location, this._fullLocation);
    }

    public createCounter(max: number): LoggerCounter {
        return new LoggerCounter(this._fullLocation, max);
    }

    public log(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages);
    }

    public error(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.redBright);
    }

    public happy(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.greenBright);
    }

    public warning(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.yellow);
    }

    protected static _log(locations: string[], messages: unknown[], colorFn?: Paint): void {
        if (Logger._silent) return;

        const _messages = messages.map((m) => {
            let msg = typeof m === 'object' ? inspect(m, { depth: 2 }) : String(m);

            if (colorFn) {
                msg = colorFn(msg);
            }

            return msg;
        });

        const _location = locations.reduce((acc, item) => acc + `[${ item }]`, '');

        console.log(`${ _location }: ${ _messages.join(' ') }`);
    }
}

/**
 * Every line it writes takes the next `i/max` slot in its location.
 */
export class LoggerCounter extends Logger {
    private _count: number;
    private readonly _max: number;

    constructor(previousLocations: string[], max: number) {
        super('', previousLocations);

        this._count = 0;
        this._max = max;
    }

    public get count(): number {
        return this._count;
    }

    protected override get _location() {
        return `${ ++this._count }/${ this._max }`;
    }
}
