import type {Dirent} from 'fs';
import path from 'path';
import fs from 'fs-extra';
import {DecodeError, FilesystemError, describeError} from '../lib/errors';
import {METADATA_FILE_NAME, getArchiveKey, submissionSchema} from './types';

const findMetadataFiles = async (directory: string): Promise<string[]> => {
	let entries: Dirent[];
	try {
		entries = await fs.readdir(directory, {withFileTypes: true});
	} catch (error) {
		throw new FilesystemError(`Failed to read directory ${directory}: ${describeError(error)}`, directory, error);
	}

	const files: string[] = [];
	for (const entry of entries) {
		const entryPath = path.join(directory, entry.name);
		if (entry.isDirectory()) {
			if (entry.name === '.git') {
				continue;
			}
			files.push(...await findMetadataFiles(entryPath));
		} else if (entry.isFile() && entry.name === METADATA_FILE_NAME) {
			files.push(entryPath);
		}
	}
	return files;
};

const readArchiveKey = async (file: string) => {
	let text: string;
	try {
		text = await fs.readFile(file, 'utf8');
	} catch (error) {
		throw new FilesystemError(`Failed to read ${file}: ${describeError(error)}`, file, error);
	}

	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (error) {
		throw new DecodeError(`Malformed metadata file ${file}: ${describeError(error)}`, file, error);
	}

	const result = submissionSchema.safeParse(json);
	if (!result.success) {
		throw new DecodeError(`Malformed metadata file ${file}: ${result.error.message}`, file, result.error);
	}
	return getArchiveKey(result.data);
};

/**
 * Collects the archive keys already present under the repository root.
 * A corrupt submission.json aborts the scan, since ignoring it would archive the problem twice.
 */
export const scanArchivedKeys = async (root: string): Promise<Set<string>> => {
	const keys = new Set<string>();
	if (!await fs.pathExists(root)) {
		return keys;
	}

	for (const file of await findMetadataFiles(root)) {
		keys.add(await readArchiveKey(file));
	}
	return keys;
};
