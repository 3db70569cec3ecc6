/* eslint-env jest */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import logger from '../lib/logger';
import {DecodeError, FilesystemError} from '../lib/errors';
import type {Submission} from './types';
import {archiveDirectory, languageToFileName, normalizeLanguage, writeArchiveEntry} from './writer';

const submission: Submission = {
	id: 3391478,
	epoch_second: 1529154123,
	problem_id: 'abc100_a',
	contest_id: 'abc100',
	user_id: 'garden',
	language: 'C++14 (GCC 5.4.1)',
	point: 100,
	length: 312,
	result: 'AC',
	execution_time: 1,
};

describe('languageToFileName', () => {
	it.each([
		['C++14', 'Main.cpp'],
		['C++ (GCC 9.2.1)', 'Main.cpp'],
		['Python3', 'Main.py'],
		['PyPy3 (7.3.0)', 'Main.py'],
		['Brainfuck', 'Main.bf'],
		['Common Lisp (SBCL 2.0.3)', 'Main.lisp'],
		['Rust (1.42.0)', 'Main.rs'],
	])('maps %s to %s', (language, fileName) => {
		expect(languageToFileName(language)).toStrictEqual({fileName, known: true});
	});

	it('falls back to Main.txt for unknown languages', () => {
		expect(languageToFileName('Zig')).toStrictEqual({fileName: 'Main.txt', known: false});
		expect(languageToFileName('Zig (0.10.1)')).toStrictEqual({fileName: 'Main.txt', known: false});
	});
});

describe('normalizeLanguage', () => {
	it('strips the parenthesized compiler suffix', () => {
		expect(normalizeLanguage('C++ (GCC 9.2.1)')).toBe('C++');
		expect(normalizeLanguage('Visual Basic (.NET Core 3.1.101)')).toBe('Visual Basic');
		expect(normalizeLanguage('Python3')).toBe('Python3');
	});

	it('leaves a name without a suffix untouched', () => {
		expect(normalizeLanguage(' Zig ')).toBe(' Zig ');
	});
});

describe('writeArchiveEntry', () => {
	let root: string;

	beforeEach(async () => {
		root = await fs.mkdtemp(path.join(os.tmpdir(), 'ac-garden-writer-'));
	});

	afterEach(async () => {
		jest.restoreAllMocks();
		await fs.remove(root);
	});

	it('writes the source and the submission record', async () => {
		const code = '#include <cstdio>\nint main() { puts("Happy"); }\n';
		const entry = await writeArchiveEntry(root, submission, code);

		const directory = path.join(root, 'atcoder.jp', 'abc100', 'abc100_a');
		expect(entry).toStrictEqual({
			directory,
			sourcePath: path.join(directory, 'Main.cpp'),
			metadataPath: path.join(directory, 'submission.json'),
			relativePaths: [
				'atcoder.jp/abc100/abc100_a/Main.cpp',
				'atcoder.jp/abc100/abc100_a/submission.json',
			],
		});
		expect(await fs.readFile(entry.sourcePath, 'utf8')).toBe(code);
		expect(await fs.readFile(entry.metadataPath, 'utf8')).toBe(JSON.stringify(submission, null, 2));
		expect((await fs.readdir(directory)).sort()).toStrictEqual(['Main.cpp', 'submission.json']);
	});

	it('writes into an existing directory', async () => {
		await fs.mkdirp(archiveDirectory(root, submission));
		const entry = await writeArchiveEntry(root, submission, 'x');
		expect(await fs.readFile(entry.sourcePath, 'utf8')).toBe('x');
	});

	it('saves unknown languages as Main.txt with a warning', async () => {
		const warn = jest.spyOn(logger, 'warn');
		const entry = await writeArchiveEntry(root, {...submission, language: 'Zig (0.10.1)'}, 'const std = @import("std");');

		expect(path.basename(entry.sourcePath)).toBe('Main.txt');
		expect(warn).toHaveBeenCalledWith('Unknown language: Zig (saving as Main.txt)');
	});

	it('refuses ids that would leave the archive directory', async () => {
		await expect(writeArchiveEntry(root, {...submission, problem_id: '..'}, 'x')).rejects.toBeInstanceOf(DecodeError);
		await expect(writeArchiveEntry(root, {...submission, contest_id: '/tmp'}, 'x')).rejects.toBeInstanceOf(DecodeError);
		await expect(writeArchiveEntry(root, {...submission, contest_id: 'a\\b'}, 'x')).rejects.toBeInstanceOf(DecodeError);
		expect(await fs.readdir(root)).toStrictEqual([]);
	});

	it('fails with FilesystemError when the directory cannot be created', async () => {
		// A file where the host directory should be
		await fs.writeFile(path.join(root, 'atcoder.jp'), '');
		await expect(writeArchiveEntry(root, submission, 'x')).rejects.toBeInstanceOf(FilesystemError);
	});
});
