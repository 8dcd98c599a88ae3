import dotenv from 'dotenv-safe';
import { env } from 'process';
import { type CliOptions, CliUsageError, parseCliArgs, USAGE } from '~/cli';
import { ENV_EXAMPLE_PATH, ENV_PATH } from '~/config';
import { Logger } from '~/logger';
import { ProxyTester } from '~/proxy_tester';
import { CheckEndpoint } from '~/proxy_tester/check.endpoint';
import { createCampaignConfig } from '~/proxy_tester/config';
import { collectOutcomes } from '~/proxy_tester/summary';
import type { CampaignConfig } from '~/proxy_tester/types';
import { ConsoleReporter } from '~/reporter';
import { Server } from '~/server';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;
const EXIT_INTERRUPTED = 130;

const logger = new Logger('proxy-probe');

async function runCampaign(config: CampaignConfig, files: string[]): Promise<number> {
    const tester = new ProxyTester(config);

    logger.log(`Loading ${ files.length } files`);

    for (const file of files) {
        try {
            const errors = await tester.loadFromFile(file);

            if (errors.length) logger.warning(`${ errors.length } lines of ${ file } could not be parsed`);
        } catch (e) {
            if (e instanceof Error) {
                logger.error(`Failed to load proxies from ${ file }:`, e.message);
                return EXIT_FAILURE;
            } else throw e;
        }
    }

    if (tester.isEmpty) {
        logger.warning('No proxies loaded, you can\'t test nothing');
        return EXIT_OK;
    }

    const reporter = new ConsoleReporter(tester.config, tester.count);
    reporter.printHeader();

    const stream = tester.run();
    const onInterrupt = () => stream.cancel();

    process.once('SIGINT', onInterrupt);

    try {
        const summary = await collectOutcomes(stream, (outcome) => reporter.report(outcome));

        reporter.printSummary(summary, stream.isCancelled);

        return stream.isCancelled ? EXIT_INTERRUPTED : EXIT_OK;
    } finally {
        process.removeListener('SIGINT', onInterrupt);
    }
}

async function runServer(config: CampaignConfig): Promise<number> {
    const server = new Server(+env.PORT);
    const check_endpoint = new CheckEndpoint(config);

    check_endpoint.getEndpoints()
    .forEach(({ path, method, handler }) => {
        server.addEndpoint(path, method, handler);
    });

    await server.start();

    await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
    });

    await server.stop();

    return EXIT_OK;
}

async function main(): Promise<number> {
    // Every key of .env.example has to be set, either in .env or in the environment.
    dotenv.config({ path: ENV_PATH, example: ENV_EXAMPLE_PATH, allowEmptyValues: true });

    if (env.LOG_SILENT === '1') Logger.setSilent(true);

    let options: CliOptions;

    try {
        options = parseCliArgs(process.argv.slice(2), env);
    } catch (e) {
        if (e instanceof CliUsageError) {
            logger.error(e.message);
            console.log(USAGE);
            return EXIT_USAGE;
        } else throw e;
    }

    if (options.help) {
        console.log(USAGE);
        return EXIT_OK;
    }

    const config = createCampaignConfig(options.input);

    if (!config.ok) {
        logger.error(config.error.message);
        return EXIT_FAILURE;
    }

    return options.serve
        ? runServer(config.config)
        : runCampaign(config.config, options.files);
}

main()
.then((code) => {
    process.exitCode = code;
})
.catch((e) => {
    logger.error(e instanceof Error ? e.message : e);
    process.exitCode = EXIT_FAILURE;
});
