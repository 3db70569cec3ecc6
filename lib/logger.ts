import winston from 'winston';
import {inspect} from 'util';

const logger = winston.createLogger({
	level: process.env.LOG_LEVEL ?? 'info',
	format: winston.format.combine(
		winston.format.timestamp(),
		winston.format.json(),
	),
	transports: [
		process.env.NODE_ENV === 'production' ?
			new winston.transports.Console() :
			new winston.transports.Console({
				level: process.env.LOG_LEVEL ?? 'debug',
				format: winston.format.combine(
					winston.format((info) => {
						info.level = info.level.toUpperCase();
						return info;
					})(),
					winston.format.colorize(),
					winston.format.printf(({level, message, timestamp, scope}) => {
						const time = typeof timestamp === 'string' ? new Date(timestamp) : new Date();
						const hh = time.getHours().toString().padStart(2, '0');
						const mm = time.getMinutes().toString().padStart(2, '0');
						const ss = time.getSeconds().toString().padStart(2, '0');
						const timeString = `\x1b[90m${hh}:${mm}:${ss}\x1b[0m`;
						const scopeString = typeof scope === 'string' ? ` \x1b[35m(${scope})\x1b[0m` : '';

						const prettyMessage = typeof message === 'string' ? message : inspect(message, {colors: true});
						return `[${level}] ${timeString}${scopeString} ${prettyMessage}`;
					}),
				),
			}),
	],
});

export default logger;
