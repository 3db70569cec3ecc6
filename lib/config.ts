import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {z} from 'zod';
import {ConfigError, describeError} from './errors';
import logger from './logger';

const log = logger.child({scope: 'config'});

const serviceSchema = z.object({
	repository_path: z.string(),
	user_id: z.string(),
	user_email: z.string(),
});

export const configSchema = z.object({
	atcoder: serviceSchema,
});

export type ServiceConfig = z.infer<typeof serviceSchema>;
export type Config = z.infer<typeof configSchema>;

export const getConfigDir = () => (
	process.env.AC_GARDEN_HOME || path.join(os.homedir(), '.ac-garden')
);

export const getConfigFile = () => path.join(getConfigDir(), 'config.json');

export const initConfig = async ({force = false}: {force?: boolean} = {}) => {
	const configFile = getConfigFile();
	await fs.mkdirp(getConfigDir());

	if (force || !await fs.pathExists(configFile)) {
		const config: Config = {
			atcoder: {
				repository_path: '',
				user_id: '',
				user_email: '',
			},
		};
		await fs.writeFile(configFile, JSON.stringify(config, null, 2));
		log.info(`Initialized your config at ${configFile}`);
	} else {
		log.info(`Config already exists at ${configFile}`);
	}

	return configFile;
};

export const loadConfig = async (): Promise<Config> => {
	const configFile = getConfigFile();
	let text: string;
	try {
		text = await fs.readFile(configFile, 'utf8');
	} catch (error) {
		throw new ConfigError(`Failed to read config file ${configFile}: ${describeError(error)}`, error);
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (error) {
		throw new ConfigError(`Failed to parse config file ${configFile}`, error);
	}

	const result = configSchema.safeParse(json);
	if (!result.success) {
		throw new ConfigError(`Invalid config file ${configFile}: ${result.error.message}`, result.error);
	}
	return result.data;
};

const requiredKeys = ['repository_path', 'user_id', 'user_email'] as const;

// Only presence is checked here; the values are used as they are.
export const assertServiceConfig = (service: ServiceConfig) => {
	const missing = requiredKeys.filter((key) => service[key].trim() === '');
	if (missing.length > 0) {
		throw new ConfigError(`Missing config values: ${missing.join(', ')} (run \`ac-garden edit\`)`);
	}
	return service;
};
