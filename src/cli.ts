#!/usr/bin/env node
import { parseCommandLine, USAGE } from './config';
import { ConfigurationError } from './errors';
import { createConsoleLogger } from './logger';
import { FileServer } from './server';

async function main(argv: readonly string[]) {
	const { options, logLevel, help } = parseCommandLine(argv, process.env);
	if (help) {
		console.info(USAGE);
		return;
	}

	const logger = createConsoleLogger(logLevel);
	const server = new FileServer({ ...options, logger });

	const { options: { workers, root } } = server;
	logger.info(`Server starting with ${ workers } workers.`);
	logger.info(`Serving files from: ${ root }`);
	const { address, port } = await server.listen();
	logger.info(`Listening on http://${ address.includes(':') ? `[${ address }]` : address }:${ port }`);

	const stop = (signal: NodeJS.Signals) => {
		logger.info(`${ signal } received, shutting down`);
		server.close()
			.then(() => {
				logger.info('server stopped');
			})
			.catch((err: unknown) => {
				logger.error('error while shutting down', err);
				process.exitCode = 1;
			});
	};
	process.once('SIGINT', stop);
	process.once('SIGTERM', stop);
}

main(process.argv.slice(2))
	.catch((err: unknown) => {
		if (err instanceof ConfigurationError) {
			console.error(`${ err.message }\n\n${ USAGE }`);
		} else {
			console.error(err);
		}
		process.exitCode = 1;
	});
