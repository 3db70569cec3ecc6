import logger from '../lib/logger';
import {scanArchivedKeys} from './archiveIndex';
import {fetchSubmissions} from './fetcher';
import {GitCommitRecorder, recordSubmission} from './git';
import type {CommitRecorder} from './git';
import {RateLimiter, SourceRetriever} from './retriever';
import {selectSubmissions} from './selector';
import type {Submission} from './types';
import {writeArchiveEntry} from './writer';
import type {ArchiveEntry} from './writer';

const log = logger.child({scope: 'archive'});

export interface ArchiveOptions {
	repositoryPath: string,
	userId: string,
	userEmail: string,
	fetchSubmissions?: (userId: string) => Promise<Submission[]>,
	// Shared by the default retriever; restarted once the submission list arrives
	limiter?: RateLimiter,
	retriever?: Pick<SourceRetriever, 'retrieve'>,
	recorder?: CommitRecorder,
}

export interface ArchivedSubmission {
	submission: Submission,
	entry: ArchiveEntry,
	// null when the archive is not a git repository
	commit: string | null,
}

export interface ArchiveReport {
	selected: number,
	archived: ArchivedSubmission[],
	skipped: Submission[],
}

export const archive = async ({
	repositoryPath,
	userId,
	userEmail,
	fetchSubmissions: fetchAll = fetchSubmissions,
	limiter = new RateLimiter(),
	retriever = new SourceRetriever(limiter),
	recorder = new GitCommitRecorder(repositoryPath),
}: ArchiveOptions): Promise<ArchiveReport> => {
	const archivedKeys = await scanArchivedKeys(repositoryPath);
	log.debug(`Found ${archivedKeys.size} archived problems in ${repositoryPath}`);

	const submissions = await fetchAll(userId);
	limiter.mark();
	const selected = selectSubmissions(submissions, archivedKeys);
	log.info(`Archiving ${selected.length} code...`);

	const report: ArchiveReport = {selected: selected.length, archived: [], skipped: []};

	for (const submission of selected) {
		const code = await retriever.retrieve(submission);
		if (code === null) {
			log.warn(`Empty source for submission ${submission.id} (${submission.contest_id} ${submission.problem_id}), skipping`);
			report.skipped.push(submission);
			continue;
		}

		const entry = await writeArchiveEntry(repositoryPath, submission, code);
		log.info(`Archived the code at ${entry.sourcePath}`);

		let commit: string | null = null;
		if (await recorder.hasRepository()) {
			commit = await recordSubmission(recorder, entry, submission, userEmail);
			log.info(`Committed ${commit.slice(0, 7)} ${submission.contest_id} ${submission.problem_id}`);
		}

		report.archived.push({submission, entry, commit});
	}

	return report;
};
