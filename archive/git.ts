import {spawn} from 'child_process';
import path from 'path';
import concat from 'concat-stream';
import fs from 'fs-extra';
import {RepositoryError, describeError} from '../lib/errors';
import type {ArchiveEntry} from './writer';
import type {Submission} from './types';

export interface Signature {
	name: string,
	email: string,
}

export interface CommitOptions {
	author: Signature,
	// Unix time in seconds
	timestamp: number,
	message: string,
	parent: string | null,
}

export interface CommitRecorder {
	hasRepository(): Promise<boolean>,
	stage(paths: string[]): Promise<void>,
	head(): Promise<string | null>,
	commit(options: CommitOptions): Promise<string>,
}

export interface GitRunOptions {
	cwd: string,
	env?: Record<string, string>,
	// Exit codes to resolve with instead of failing
	allowedExitCodes?: number[],
}

export interface GitResult {
	code: number,
	stdout: string,
	stderr: string,
}

export type GitRunner = (args: string[], options: GitRunOptions) => Promise<GitResult>;

export const spawnGit: GitRunner = async (args, {cwd, env = {}, allowedExitCodes = []}) => {
	const command = ['git', ...args];
	const proc = spawn('git', args, {
		cwd,
		env: {...process.env, ...env},
	});

	const stdout = new Promise<string>((resolve) => {
		proc.stdout.pipe(concat({encoding: 'string'}, resolve));
	});
	const stderr = new Promise<string>((resolve) => {
		proc.stderr.pipe(concat({encoding: 'string'}, resolve));
	});

	const code = await new Promise<number>((resolve, reject) => {
		proc.on('error', (error) => {
			reject(new RepositoryError(`Failed to run git: ${describeError(error)}`, command, '', error));
		});
		proc.on('close', (exitCode) => {
			resolve(exitCode ?? -1);
		});
	});

	const result = {code, stdout: await stdout, stderr: await stderr};
	if (code !== 0 && !allowedExitCodes.includes(code)) {
		throw new RepositoryError(`git ${args[0]} exited with code ${code}: ${result.stderr.trim()}`, command, result.stderr);
	}
	return result;
};

const formatGitDate = (timestamp: number) => `@${timestamp} +0000`;

/** Records commits by driving the git executable in the repository root. */
export class GitCommitRecorder implements CommitRecorder {
	constructor(
		readonly root: string,
		private readonly run: GitRunner = spawnGit,
	) {}

	hasRepository() {
		return fs.pathExists(path.join(this.root, '.git'));
	}

	async stage(paths: string[]) {
		await this.run(['add', '--', ...paths], {cwd: this.root});
	}

	async head() {
		const {code, stdout} = await this.run(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}'], {
			cwd: this.root,
			allowedExitCodes: [1],
		});
		if (code !== 0) {
			return null;
		}
		return stdout.trim();
	}

	async commit({author, timestamp, message, parent}: CommitOptions) {
		const {stdout: treeOutput} = await this.run(['write-tree'], {cwd: this.root});
		const tree = treeOutput.trim();

		const date = formatGitDate(timestamp);
		// Also used for the reflog entry of update-ref
		const env = {
			GIT_AUTHOR_NAME: author.name,
			GIT_AUTHOR_EMAIL: author.email,
			GIT_AUTHOR_DATE: date,
			GIT_COMMITTER_NAME: author.name,
			GIT_COMMITTER_EMAIL: author.email,
			GIT_COMMITTER_DATE: date,
		};
		const {stdout: commitOutput} = await this.run([
			'commit-tree',
			tree,
			...(parent === null ? [] : ['-p', parent]),
			'-m',
			message,
		], {cwd: this.root, env});
		const commit = commitOutput.trim();

		// HEAD is symbolic, so this moves the current branch. Fails if it moved away from `parent`.
		await this.run([
			'update-ref',
			'-m',
			`commit: ${message}`,
			'HEAD',
			commit,
			...(parent === null ? [] : [parent]),
		], {cwd: this.root, env});

		return commit;
	}
}

export const getCommitMessage = ({contest_id, problem_id}: Pick<Submission, 'contest_id' | 'problem_id'>) => (
	`[AC] ${contest_id} ${problem_id}`
);

/**
 * Stages the entry's files and commits them on top of the current HEAD.
 * With no commits yet the new commit becomes the root commit.
 */
export const recordSubmission = async (
	recorder: CommitRecorder,
	entry: ArchiveEntry,
	submission: Submission,
	email: string,
) => {
	await recorder.stage(entry.relativePaths);
	const parent = await recorder.head();
	return recorder.commit({
		author: {name: submission.user_id, email},
		timestamp: submission.epoch_second,
		message: getCommitMessage(submission),
		parent,
	});
};
