export type ErrorType =
	'NetworkError' |
	'DecodeError' |
	'RepositoryError' |
	'FilesystemError' |
	'ConfigError';

export abstract class AcGardenError extends Error {
	abstract readonly type: ErrorType;

	constructor(message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : {cause});
		this.name = new.target.name;
	}
}

/** Transport failure on the submissions API or a submission page. */
export class NetworkError extends AcGardenError {
	readonly type = 'NetworkError';

	constructor(message: string, public url: string, cause?: unknown) {
		super(message, cause);
	}
}

/** Malformed API response or malformed submission.json in the archive. */
export class DecodeError extends AcGardenError {
	readonly type = 'DecodeError';

	constructor(message: string, public source: string, cause?: unknown) {
		super(message, cause);
	}
}

export class RepositoryError extends AcGardenError {
	readonly type = 'RepositoryError';

	constructor(message: string, public command: string[] = [], public stderr = '', cause?: unknown) {
		super(message, cause);
	}
}

export class FilesystemError extends AcGardenError {
	readonly type = 'FilesystemError';

	constructor(message: string, public path: string, cause?: unknown) {
		super(message, cause);
	}
}

export class ConfigError extends AcGardenError {
	readonly type = 'ConfigError';
}

export const describeError = (error: unknown): string => {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
};
