#!/usr/bin/env node
import dotenv from 'dotenv';

dotenv.config();

import {spawn} from 'child_process';
import fs from 'fs-extra';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {archive} from './archive';
import {assertServiceConfig, getConfigFile, initConfig, loadConfig} from './lib/config';
import {describeError} from './lib/errors';
import logger from './lib/logger';

const log = logger.child({scope: 'index'});

process.on('unhandledRejection', (error: unknown) => {
	log.error(`unhandledRejection: ${describeError(error)}`, {error});
});

export const archiveCommand = async () => {
	const config = await loadConfig();
	const {repository_path, user_id, user_email} = assertServiceConfig(config.atcoder);
	const report = await archive({
		repositoryPath: repository_path,
		userId: user_id,
		userEmail: user_email,
	});
	log.info(`Archived ${report.archived.length} of ${report.selected} submissions (${report.skipped.length} skipped)`);
};

const getOpenCommand = (file: string): [string, string[]] => {
	if (process.env.EDITOR) {
		return [process.env.EDITOR, [file]];
	}
	if (process.platform === 'win32') {
		return ['cmd', ['/c', 'start', '', file]];
	}
	if (process.platform === 'darwin') {
		return ['open', [file]];
	}
	return ['xdg-open', [file]];
};

export const editCommand = async () => {
	const configFile = getConfigFile();
	if (!await fs.pathExists(configFile)) {
		await initConfig({force: true});
	}

	const [command, args] = getOpenCommand(configFile);
	log.debug(`Opening ${configFile} with ${command}`);
	await new Promise<void>((resolve, reject) => {
		const proc = spawn(command, args, {stdio: 'inherit'});
		proc.on('error', reject);
		proc.on('close', (code) => {
			if (code === 0) {
				resolve();
			} else {
				reject(new Error(`${command} exited with code ${code}`));
			}
		});
	});
};

const run = async (task: () => Promise<unknown>) => {
	try {
		await task();
	} catch (error) {
		log.error(describeError(error), {error});
		process.exitCode = 1;
	}
};

if (require.main === module) {
	yargs(hideBin(process.argv))
		.scriptName('ac-garden')
		.command('archive', 'Archive your AC submissions', {}, () => run(archiveCommand))
		.command(
			'init',
			'Initialize your config',
			(args) => args.option('force', {
				alias: 'f',
				type: 'boolean',
				default: false,
				describe: 'Force recreate config',
			}),
			(argv) => run(() => initConfig({force: argv.force})),
		)
		.command('edit', 'Edit your config file', {}, () => run(editCommand))
		.demandCommand(1)
		.strict()
		.help()
		.parseAsync()
		.catch((error: unknown) => {
			log.error(describeError(error), {error});
			process.exitCode = 1;
		});
}
