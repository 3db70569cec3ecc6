import path from 'path';
import fs from 'fs-extra';
import {DecodeError, FilesystemError, describeError} from '../lib/errors';
import logger from '../lib/logger';
import languages from './languages.json';
import {ARCHIVE_HOST, METADATA_FILE_NAME, isPathSegment} from './types';
import type {Submission} from './types';

const log = logger.child({scope: 'writer'});

export const FALLBACK_FILE_NAME = 'Main.txt';

const fileNames = new Map<string, string>(Object.entries(languages));

export const normalizeLanguage = (language: string) => {
	const index = language.indexOf('(');
	return index === -1 ? language : language.slice(0, index).trim();
};

// "C++ (GCC 9.2.1)" -> Main.cpp
export const languageToFileName = (language: string) => {
	const name = normalizeLanguage(language);
	const fileName = fileNames.get(name);
	if (fileName === undefined) {
		return {fileName: FALLBACK_FILE_NAME, known: false};
	}
	return {fileName, known: true};
};

export interface ArchiveEntry {
	directory: string,
	sourcePath: string,
	metadataPath: string,
	// Relative to the repository root, separated by "/"
	relativePaths: string[],
}

export const getArchiveSegments = ({contest_id, problem_id}: Pick<Submission, 'contest_id' | 'problem_id'>) => {
	for (const segment of [contest_id, problem_id]) {
		if (!isPathSegment(segment)) {
			throw new DecodeError(`Refusing to archive outside the repository: ${JSON.stringify(segment)}`, segment);
		}
	}
	return [ARCHIVE_HOST, contest_id, problem_id];
};

export const archiveDirectory = (root: string, submission: Submission) => (
	path.join(root, ...getArchiveSegments(submission))
);

const writeFile = async (file: string, content: string) => {
	try {
		await fs.writeFile(file, content);
	} catch (error) {
		throw new FilesystemError(`Failed to write ${file}: ${describeError(error)}`, file, error);
	}
};

export const writeArchiveEntry = async (root: string, submission: Submission, code: string): Promise<ArchiveEntry> => {
	const {fileName, known} = languageToFileName(submission.language);
	if (!known) {
		log.warn(`Unknown language: ${normalizeLanguage(submission.language)} (saving as ${fileName})`);
	}

	const directory = archiveDirectory(root, submission);
	try {
		await fs.mkdirp(directory);
	} catch (error) {
		throw new FilesystemError(`Failed to create directory ${directory}: ${describeError(error)}`, directory, error);
	}

	const sourcePath = path.join(directory, fileName);
	const metadataPath = path.join(directory, METADATA_FILE_NAME);
	await writeFile(sourcePath, code);
	await writeFile(metadataPath, JSON.stringify(submission, null, 2));

	const segments = getArchiveSegments(submission);
	return {
		directory,
		sourcePath,
		metadataPath,
		relativePaths: [
			[...segments, fileName].join('/'),
			[...segments, METADATA_FILE_NAME].join('/'),
		],
	};
};
